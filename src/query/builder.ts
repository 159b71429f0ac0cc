import { CompositionError } from '../errors.js';
import type { Projection } from '../projection/projections.js';
import { Expression, OrderSpecifier } from './expressions.js';
import type { AnyExpression } from './expressions.js';
import type { EntityPath, RelationPath } from './paths.js';
import { Predicate } from './predicate.js';
import { allOf } from './predicate-builder.js';
import type { ExpressionNode, JoinKind, JoinSpec, PredicateNode, QueryDescriptor } from './types.js';

type MaybePredicate = Predicate | null | undefined;

function andNodes(existing: PredicateNode | null, added: Predicate): PredicateNode | null {
  const combined = existing === null ? added : new Predicate(existing).and(added);
  return combined.isTrue ? null : combined.node;
}

function assertCount(value: number, what: 'offset' | 'limit'): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new CompositionError(`${what} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Fluent immutable query. Every operation returns a new Query; existing
 * instances are never mutated, so a base query can be shared and refined
 * per request.
 *
 * A query with a single scalar column is also an expression: it can be
 * compared against, used with in()/notIn(), or projected as a sub-query.
 */
export class Query<R> extends Expression<R> {
  constructor(
    readonly descriptor: QueryDescriptor,
    readonly projection: Projection<R>,
  ) {
    super({ kind: 'subquery', query: descriptor });
  }

  from(...sources: EntityPath[]): Query<R> {
    let next = this.descriptor;
    for (const source of sources) {
      this.assertUndeclared(next, source.alias);
      next = { ...next, from: [...next.from, source.ref] };
    }
    return this.derive(next);
  }

  /** Inner join over a relation (`join(member.relation('team'), team)`) or a theta join (`join(team).on(...)`). */
  join(relationOrTarget: RelationPath | EntityPath, alias?: EntityPath): Query<R> {
    return this.addJoin('inner', relationOrTarget, alias);
  }

  innerJoin(relationOrTarget: RelationPath | EntityPath, alias?: EntityPath): Query<R> {
    return this.addJoin('inner', relationOrTarget, alias);
  }

  leftJoin(relationOrTarget: RelationPath | EntityPath, alias?: EntityPath): Query<R> {
    return this.addJoin('left', relationOrTarget, alias);
  }

  rightJoin(relationOrTarget: RelationPath | EntityPath, alias?: EntityPath): Query<R> {
    return this.addJoin('right', relationOrTarget, alias);
  }

  /**
   * Restricts the most recent join. Unlike where(), an ON filter on an outer
   * join keeps driving-side rows that find no match.
   */
  on(...conditions: MaybePredicate[]): Query<R> {
    return this.withLastJoin('on', (join) => ({ ...join, on: andNodes(join.on, allOf(...conditions)) }));
  }

  /** Marks the most recent join to materialize the related entity in the same round trip. */
  fetchJoin(): Query<R> {
    return this.withLastJoin('fetchJoin', (join) => {
      if (join.relation === null) {
        throw new CompositionError(`fetchJoin() needs a relation join; "${join.target.alias}" is a theta join`);
      }
      if (join.relation.field.kind !== 'manyToOne') {
        throw new CompositionError(
          `fetchJoin() on collection ${join.relation.field.name} is not supported; fetch the owning side instead`,
        );
      }
      return { ...join, fetch: true };
    });
  }

  /** Null and undefined arguments are skipped; the rest are ANDed with any existing filter. */
  where(...conditions: MaybePredicate[]): Query<R> {
    return this.derive({ ...this.descriptor, where: andNodes(this.descriptor.where, allOf(...conditions)) });
  }

  groupBy(...expressions: AnyExpression[]): Query<R> {
    const keys: ExpressionNode[] = expressions.map((e) => e.node);
    return this.derive({ ...this.descriptor, groupBy: [...this.descriptor.groupBy, ...keys] });
  }

  having(...conditions: MaybePredicate[]): Query<R> {
    return this.derive({ ...this.descriptor, having: andNodes(this.descriptor.having, allOf(...conditions)) });
  }

  orderBy(...orders: OrderSpecifier[]): Query<R> {
    return this.derive({ ...this.descriptor, orderBy: [...this.descriptor.orderBy, ...orders.map((o) => o.spec)] });
  }

  offset(offset: number): Query<R> {
    assertCount(offset, 'offset');
    return this.derive({ ...this.descriptor, offset });
  }

  limit(limit: number): Query<R> {
    assertCount(limit, 'limit');
    return this.derive({ ...this.descriptor, limit });
  }

  private derive(descriptor: QueryDescriptor): Query<R> {
    return new Query<R>(descriptor, this.projection);
  }

  private assertUndeclared(descriptor: QueryDescriptor, alias: string): void {
    const taken =
      descriptor.from.some((s) => s.alias === alias) || descriptor.joins.some((j) => j.target.alias === alias);
    if (taken) {
      throw new CompositionError(`Alias "${alias}" is already declared in this query`);
    }
  }

  private addJoin(kind: JoinKind, relationOrTarget: RelationPath | EntityPath, alias?: EntityPath): Query<R> {
    let join: JoinSpec;
    if ('field' in relationOrTarget) {
      if (alias === undefined) {
        throw new CompositionError(`Join over ${relationOrTarget.field.name} needs a target alias`);
      }
      const { owner, field } = relationOrTarget;
      if (alias.entity.name !== field.target) {
        throw new CompositionError(
          `${owner.entity.name}.${field.name} targets ${field.target}, not ${alias.entity.name}`,
        );
      }
      const ownerDeclared =
        this.descriptor.from.some((s) => s.alias === owner.alias) ||
        this.descriptor.joins.some((j) => j.target.alias === owner.alias);
      if (!ownerDeclared) {
        throw new CompositionError(`Join owner "${owner.alias}" is not declared in this query`);
      }
      join = { kind, target: alias.ref, relation: { ownerAlias: owner.alias, field }, on: null, fetch: false };
    } else {
      if (alias !== undefined) {
        throw new CompositionError('A theta join takes the target entity only; declare the condition with on()');
      }
      join = { kind, target: relationOrTarget.ref, relation: null, on: null, fetch: false };
    }
    this.assertUndeclared(this.descriptor, join.target.alias);
    return this.derive({ ...this.descriptor, joins: [...this.descriptor.joins, join] });
  }

  private withLastJoin(operation: string, update: (join: JoinSpec) => JoinSpec): Query<R> {
    const joins = this.descriptor.joins;
    const last = joins[joins.length - 1];
    if (last === undefined) {
      throw new CompositionError(`${operation}() must follow a join`);
    }
    return this.derive({ ...this.descriptor, joins: [...joins.slice(0, -1), update(last)] });
  }
}
