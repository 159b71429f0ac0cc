import { MemoryDataSource, QueryExecutor } from '../../../src/index.js';
import { Member, Team, schema } from '../../src/domain/entities.js';
import { MemberRepository } from '../../src/repository/member-repository.js';

/**
 * teamA: member1 (10), member2 (20)
 * teamB: member3 (30), member4 (40)
 * no team: drifter (50)
 */
export function seededSource(): MemoryDataSource {
  const source = new MemoryDataSource({ schema });
  const teamA = source.insert(Team, { name: 'teamA' });
  const teamB = source.insert(Team, { name: 'teamB' });
  source.insert(Member, { username: 'member1', age: 10, team: teamA });
  source.insert(Member, { username: 'member2', age: 20, team: teamA });
  source.insert(Member, { username: 'member3', age: 30, team: teamB });
  source.insert(Member, { username: 'member4', age: 40, team: teamB });
  source.insert(Member, { username: 'drifter', age: 50 });
  return source;
}

export function createTestRepository(): MemberRepository {
  return new MemberRepository(new QueryExecutor({ source: seededSource(), onError: () => {} }));
}
