/** Filled by property assignment. */
export class MemberDto {
  username: string | null = null;
  age: number | null = null;
}

/** Same values as MemberDto under a different field name; bound by alias. */
export class UserDto {
  name: string | null = null;
  age: number | null = null;
}

/** Member joined with its (optional) team. Built positionally. */
export class MemberTeamDto {
  constructor(
    readonly memberId: number | null,
    readonly username: string | null,
    readonly age: number | null,
    readonly teamId: number | null,
    readonly teamName: string | null,
  ) {}
}

/** Search criteria. Every property is optional; an absent one does not filter. */
export interface MemberSearchCondition {
  username?: string | undefined;
  teamName?: string | undefined;
  ageGoe?: number | undefined;
  ageLoe?: number | undefined;
}

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface Page<T> {
  content: T[];
  total: number;
  offset: number;
  limit: number;
}
