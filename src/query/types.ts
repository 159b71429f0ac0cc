import type { EntitySchema, RelationField, ScalarType } from '../schema/entity.js';

export type Literal = string | number | boolean | Date | null;

export type ValueType = ScalarType | 'unknown';

export type AggregateFn = 'count' | 'countDistinct' | 'sum' | 'avg' | 'max' | 'min';

export type CompareOp = 'eq' | 'ne' | 'gt' | 'goe' | 'lt' | 'loe';

export interface CaseBranch {
  when: PredicateNode;
  then: ExpressionNode;
}

export type ExpressionNode =
  | { kind: 'field'; alias: string; entity: string; field: string; column: string; type: ScalarType }
  | { kind: 'column'; alias: string; column: string; type: ValueType }
  | { kind: 'constant'; value: Literal }
  | { kind: 'aggregate'; fn: AggregateFn; arg: ExpressionNode | null }
  | { kind: 'concat'; parts: ExpressionNode[] }
  | { kind: 'stringValue'; arg: ExpressionNode }
  | { kind: 'case'; branches: CaseBranch[]; otherwise: ExpressionNode }
  | { kind: 'subquery'; query: QueryDescriptor };

export type PredicateNode =
  | { kind: 'true' }
  | { kind: 'compare'; op: CompareOp; left: ExpressionNode; right: ExpressionNode }
  | { kind: 'between'; operand: ExpressionNode; low: ExpressionNode; high: ExpressionNode }
  | { kind: 'in'; operand: ExpressionNode; list: ExpressionNode[]; negated: boolean }
  | { kind: 'inQuery'; operand: ExpressionNode; query: QueryDescriptor; negated: boolean }
  | { kind: 'null'; operand: ExpressionNode; negated: boolean }
  | { kind: 'like'; operand: ExpressionNode; pattern: string }
  | { kind: 'and'; predicates: PredicateNode[] }
  | { kind: 'or'; predicates: PredicateNode[] }
  | { kind: 'not'; predicate: PredicateNode };

/** An entity bound under an alias inside one query. */
export interface SourceRef {
  readonly alias: string;
  readonly entity: EntitySchema;
}

export type JoinKind = 'inner' | 'left' | 'right';

export interface JoinSpec {
  readonly kind: JoinKind;
  readonly target: SourceRef;
  /** null for a theta join, which is driven by `on` alone. */
  readonly relation: { readonly ownerAlias: string; readonly field: RelationField } | null;
  readonly on: PredicateNode | null;
  readonly fetch: boolean;
}

export type SelectItem =
  | { kind: 'entity'; alias: string }
  | { kind: 'expression'; expr: ExpressionNode; name: string | null };

export type NullPlacement = 'first' | 'last' | 'default';

export interface OrderSpec {
  readonly expr: ExpressionNode;
  readonly direction: 'asc' | 'desc';
  readonly nulls: NullPlacement;
}

/**
 * Structured, immutable description of one query. Built exclusively via the
 * query DSL; data sources consume it read-only.
 */
export interface QueryDescriptor {
  readonly select: readonly SelectItem[];
  readonly from: readonly SourceRef[];
  readonly joins: readonly JoinSpec[];
  readonly where: PredicateNode | null;
  readonly groupBy: readonly ExpressionNode[];
  readonly having: PredicateNode | null;
  readonly orderBy: readonly OrderSpec[];
  readonly offset: number | null;
  readonly limit: number | null;
}

export const EMPTY_DESCRIPTOR: QueryDescriptor = {
  select: [],
  from: [],
  joins: [],
  where: null,
  groupBy: [],
  having: null,
  orderBy: [],
  offset: null,
  limit: null,
};

/** Result type of an expression, as far as composition can tell. */
export function typeOf(node: ExpressionNode): ValueType {
  switch (node.kind) {
    case 'field':
    case 'column':
      return node.type;
    case 'constant': {
      const v = node.value;
      if (v === null) return 'unknown';
      if (v instanceof Date) return 'date';
      if (typeof v === 'string') return 'string';
      if (typeof v === 'number') return 'number';
      return 'boolean';
    }
    case 'aggregate':
      if (node.fn === 'max' || node.fn === 'min') {
        return node.arg === null ? 'unknown' : typeOf(node.arg);
      }
      return 'number';
    case 'concat':
    case 'stringValue':
      return 'string';
    case 'case': {
      const first = node.branches[0];
      return first === undefined ? typeOf(node.otherwise) : typeOf(first.then);
    }
    case 'subquery': {
      const item = node.query.select[0];
      return item !== undefined && item.kind === 'expression' ? typeOf(item.expr) : 'unknown';
    }
  }
}

/** True when the node aggregates at this query level (sub-queries excluded). */
export function containsAggregate(node: ExpressionNode): boolean {
  switch (node.kind) {
    case 'aggregate':
      return true;
    case 'concat':
      return node.parts.some(containsAggregate);
    case 'stringValue':
      return containsAggregate(node.arg);
    case 'case':
      return (
        node.branches.some((b) => predicateContainsAggregate(b.when) || containsAggregate(b.then)) ||
        containsAggregate(node.otherwise)
      );
    default:
      return false;
  }
}

export function predicateContainsAggregate(node: PredicateNode): boolean {
  switch (node.kind) {
    case 'true':
      return false;
    case 'compare':
      return containsAggregate(node.left) || containsAggregate(node.right);
    case 'between':
      return [node.operand, node.low, node.high].some(containsAggregate);
    case 'in':
      return containsAggregate(node.operand) || node.list.some(containsAggregate);
    case 'inQuery':
    case 'null':
    case 'like':
      return containsAggregate(node.operand);
    case 'and':
    case 'or':
      return node.predicates.some(predicateContainsAggregate);
    case 'not':
      return predicateContainsAggregate(node.predicate);
  }
}
