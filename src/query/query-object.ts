import { CompositionError } from '../errors.js';
import type { EntityRecord } from '../projection/entity-record.js';
import { Projection, ScalarProjection, TupleProjection, selectItem } from '../projection/projections.js';
import type { Selectable } from '../projection/projections.js';
import type { Tuple } from '../projection/tuple.js';
import { Query } from './builder.js';
import type { Expression } from './expressions.js';
import type { EntityPath } from './paths.js';
import { EMPTY_DESCRIPTOR } from './types.js';

function start<R>(projection: Projection<R>): Query<R> {
  return new Query<R>({ ...EMPTY_DESCRIPTOR, select: projection.items }, projection);
}

function select<R>(projection: Projection<R>): Query<R>;
function select(path: EntityPath): Query<EntityRecord>;
function select<T>(expression: Expression<T>): Query<T>;
function select(first: Selectable, second: Selectable, ...rest: Selectable[]): Query<Tuple>;
function select(...items: (Selectable | Projection<unknown>)[]): Query<unknown> {
  const [first, ...rest] = items;
  if (first === undefined) {
    throw new CompositionError('select() needs at least one expression');
  }
  if (first instanceof Projection) {
    if (rest.length > 0) {
      throw new CompositionError('A record projection must be the only argument of select()');
    }
    return start(first);
  }
  const selectables: Selectable[] = [];
  for (const item of items) {
    if (item instanceof Projection) {
      throw new CompositionError('A record projection must be the only argument of select()');
    }
    selectables.push(item);
  }
  if (selectables.length === 1) {
    return start(new ScalarProjection<unknown>(selectItem(first)));
  }
  return start(new TupleProjection(selectables.map(selectItem)));
}

/**
 * Entry point for the query DSL.
 *
 * @example
 * const member = entity(Member);
 * const team = entity(Team);
 * query.selectFrom(member)
 *   .join(member.relation('team'), team)
 *   .where(team.string('name').eq('teamA'))
 *   .orderBy(member.number('age').desc(), member.string('username').asc().nullsLast())
 */
export const query = {
  select,

  /** select(path).from(path) */
  selectFrom(path: EntityPath): Query<EntityRecord> {
    return select(path).from(path);
  },
};
