import { Projections, entity, predicates, query } from '../../../src/index.js';
import type { EntityRecord, Predicate, Query, QueryExecutor } from '../../../src/index.js';
import { Member, Team } from '../domain/entities.js';
import { MemberTeamDto } from '../domain/dto.js';
import type { MemberSearchCondition, Page, PageRequest } from '../domain/dto.js';

const member = entity(Member);
const team = entity(Team);

const memberId = member.number('id');
const username = member.string('username');
const age = member.number('age');
const teamId = team.number('id');
const teamName = team.string('name');

function hasText(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

function usernameEq(value: string | undefined): Predicate | null {
  return hasText(value) ? username.eq(value) : null;
}

function teamNameEq(value: string | undefined): Predicate | null {
  return hasText(value) ? teamName.eq(value) : null;
}

function ageGoe(value: number | undefined): Predicate | null {
  return value === undefined ? null : age.goe(value);
}

function ageLoe(value: number | undefined): Predicate | null {
  return value === undefined ? null : age.loe(value);
}

function memberTeams(): Query<MemberTeamDto> {
  return query
    .select(Projections.constructor(MemberTeamDto, memberId, username, age, teamId, teamName))
    .from(member)
    .leftJoin(member.relation('team'), team);
}

/**
 * Read-side access to members. Every search accepts a partially filled
 * condition; absent properties do not filter.
 */
export class MemberRepository {
  constructor(private readonly executor: QueryExecutor) {}

  async findAll(): Promise<EntityRecord[]> {
    return this.executor.fetchAll(query.selectFrom(member).orderBy(memberId.asc()));
  }

  async findById(id: number): Promise<MemberTeamDto | null> {
    return this.executor.fetchOne(memberTeams().where(memberId.eq(id)));
  }

  async findByUsername(name: string): Promise<EntityRecord[]> {
    return this.executor.fetchAll(query.selectFrom(member).where(username.eq(name)).orderBy(memberId.asc()));
  }

  /** Criteria accumulated with the predicate builder. */
  async searchByBuilder(condition: MemberSearchCondition): Promise<MemberTeamDto[]> {
    const where = predicates()
      .ifText(condition.username, (v) => username.eq(v))
      .ifText(condition.teamName, (v) => teamName.eq(v))
      .ifPresent(condition.ageGoe, (v) => age.goe(v))
      .ifPresent(condition.ageLoe, (v) => age.loe(v))
      .build();
    return this.executor.fetchAll(memberTeams().where(where).orderBy(memberId.asc()));
  }

  /** Criteria passed as nullable where() arguments. */
  async searchByWhere(condition: MemberSearchCondition): Promise<MemberTeamDto[]> {
    return this.executor.fetchAll(memberTeams().where(...this.conditions(condition)).orderBy(memberId.asc()));
  }

  /** One page of the search plus the total match count, from two queries over the same criteria. */
  async searchPage(condition: MemberSearchCondition, page: PageRequest): Promise<Page<MemberTeamDto>> {
    const conditions = this.conditions(condition);
    const content = await this.executor.fetchAll(
      memberTeams().where(...conditions).orderBy(memberId.asc()).offset(page.offset).limit(page.limit),
    );
    const total = await this.executor.fetchOne(
      query.select(member.count()).from(member).leftJoin(member.relation('team'), team).where(...conditions),
    );
    return { content, total: total ?? 0, offset: page.offset, limit: page.limit };
  }

  private conditions(condition: MemberSearchCondition): (Predicate | null)[] {
    return [
      usernameEq(condition.username),
      teamNameEq(condition.teamName),
      ageGoe(condition.ageGoe),
      ageLoe(condition.ageLoe),
    ];
  }
}
