import { Predicate } from './predicate.js';

type MaybePredicate = Predicate | null | undefined;

/**
 * Folds optional predicates with AND. Absent entries are skipped; when
 * nothing is left the result is Predicate.TRUE, never null.
 */
export function allOf(...predicates: readonly MaybePredicate[]): Predicate {
  return predicates.reduce<Predicate>(
    (acc, p) => (p === null || p === undefined ? acc : acc.and(p)),
    Predicate.TRUE,
  );
}

function hasText(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value.trim() !== '';
}

/**
 * Conditional predicate accumulation. Steps are applied in the order they
 * are chained; every step returns a new builder, so one composition can be
 * branched without affecting another.
 *
 * @example
 * predicates()
 *   .ifText(condition.username, (v) => member.string('username').eq(v))
 *   .ifPresent(condition.ageGoe, (v) => member.number('age').goe(v))
 *   .build()
 */
export class PredicateBuilder {
  constructor(private readonly current: Predicate | null = null) {}

  /** True once at least one predicate has been contributed. */
  get hasValue(): boolean {
    return this.current !== null;
  }

  and(predicate: MaybePredicate): PredicateBuilder {
    if (predicate === null || predicate === undefined) return this;
    return new PredicateBuilder(this.current === null ? predicate : this.current.and(predicate));
  }

  or(predicate: MaybePredicate): PredicateBuilder {
    if (predicate === null || predicate === undefined) return this;
    return new PredicateBuilder(this.current === null ? predicate : this.current.or(predicate));
  }

  /** Contributes `predicate` only when `condition` holds. A thunk is not evaluated otherwise. */
  when(condition: boolean, predicate: Predicate | (() => Predicate)): PredicateBuilder {
    if (!condition) return this;
    return this.and(typeof predicate === 'function' ? predicate() : predicate);
  }

  /** Contributes a predicate built from `value` unless it is null or undefined. */
  ifPresent<V>(value: V | null | undefined, build: (value: V) => Predicate): PredicateBuilder {
    if (value === null || value === undefined) return this;
    return this.and(build(value));
  }

  /** Like ifPresent, but also skips empty and whitespace-only strings. */
  ifText(value: string | null | undefined, build: (value: string) => Predicate): PredicateBuilder {
    if (!hasText(value)) return this;
    return this.and(build(value));
  }

  build(): Predicate {
    return this.current ?? Predicate.TRUE;
  }
}

export function predicates(initial?: Predicate): PredicateBuilder {
  return new PredicateBuilder(initial ?? null);
}
