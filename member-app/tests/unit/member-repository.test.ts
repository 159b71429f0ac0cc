import { describe, it, expect, beforeEach } from 'vitest';
import { isLoaded } from '../../../src/index.js';
import { MemberTeamDto } from '../../src/domain/dto.js';
import type { MemberRepository } from '../../src/repository/member-repository.js';
import { createTestRepository } from './helpers.js';

let repository: MemberRepository;

beforeEach(() => {
  repository = createTestRepository();
});

describe('MemberRepository', () => {
  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  it('findAll returns every member ordered by id', async () => {
    const members = await repository.findAll();
    expect(members.map((m) => m['username'])).toEqual(['member1', 'member2', 'member3', 'member4', 'drifter']);
  });

  it('findAll leaves the team relation unfetched', async () => {
    const [first] = await repository.findAll();
    expect(first).toBeDefined();
    expect(isLoaded(first!, 'team')).toBe(false);
  });

  it('findById returns the member with its team', async () => {
    const found = await repository.findById(3);
    expect(found).toEqual(new MemberTeamDto(3, 'member3', 30, 2, 'teamB'));
  });

  it('findById keeps a member without a team', async () => {
    const found = await repository.findById(5);
    expect(found).toEqual(new MemberTeamDto(5, 'drifter', 50, null, null));
  });

  it('findById returns null for an unknown id', async () => {
    expect(await repository.findById(99)).toBeNull();
  });

  it('findByUsername matches exactly', async () => {
    const members = await repository.findByUsername('member2');
    expect(members).toHaveLength(1);
    expect(members[0]?.['age']).toBe(20);
    expect(await repository.findByUsername('member')).toEqual([]);
  });

  // ---------------------------------------------------------------------------
  // Dynamic search
  // ---------------------------------------------------------------------------

  it('searchByBuilder combines every present criterion', async () => {
    const result = await repository.searchByBuilder({ ageGoe: 35, ageLoe: 40, teamName: 'teamB' });
    expect(result).toEqual([new MemberTeamDto(4, 'member4', 40, 2, 'teamB')]);
  });

  it('searchByBuilder with no criteria returns everyone', async () => {
    const result = await repository.searchByBuilder({});
    expect(result.map((m) => m.memberId)).toEqual([1, 2, 3, 4, 5]);
  });

  it('searchByBuilder ignores blank text criteria', async () => {
    const result = await repository.searchByBuilder({ username: '   ', ageLoe: 20 });
    expect(result.map((m) => m.username)).toEqual(['member1', 'member2']);
  });

  it('searchByWhere matches searchByBuilder for the same condition', async () => {
    const conditions = [
      { ageGoe: 35, ageLoe: 40, teamName: 'teamB' },
      { username: 'member1' },
      { teamName: '' },
      { ageGoe: 25 },
      {},
    ];
    for (const condition of conditions) {
      const byWhere = await repository.searchByWhere(condition);
      const byBuilder = await repository.searchByBuilder(condition);
      expect(byWhere).toEqual(byBuilder);
    }
  });

  it('a team criterion excludes members without a team', async () => {
    const result = await repository.searchByWhere({ teamName: 'teamA' });
    expect(result.map((m) => m.memberId)).toEqual([1, 2]);
  });

  // ---------------------------------------------------------------------------
  // Paging
  // ---------------------------------------------------------------------------

  it('searchPage returns one page and the total match count', async () => {
    const page = await repository.searchPage({}, { offset: 1, limit: 2 });
    expect(page.content.map((m) => m.memberId)).toEqual([2, 3]);
    expect(page.total).toBe(5);
    expect(page.offset).toBe(1);
    expect(page.limit).toBe(2);
  });

  it('searchPage counts only matching members', async () => {
    const page = await repository.searchPage({ ageGoe: 30 }, { offset: 0, limit: 10 });
    expect(page.content.map((m) => m.username)).toEqual(['member3', 'member4', 'drifter']);
    expect(page.total).toBe(3);
  });

  it('searchPage past the end has empty content but keeps the total', async () => {
    const page = await repository.searchPage({ teamName: 'teamB' }, { offset: 10, limit: 5 });
    expect(page.content).toEqual([]);
    expect(page.total).toBe(2);
  });
});
