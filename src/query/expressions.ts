import { CompositionError } from '../errors.js';
import { Predicate } from './predicate.js';
import { typeOf } from './types.js';
import type {
  AggregateFn,
  CaseBranch,
  CompareOp,
  ExpressionNode,
  Literal,
  NullPlacement,
  OrderSpec,
  PredicateNode,
  QueryDescriptor,
  ValueType,
} from './types.js';

/** A literal value, or any expression producing a value of the same type. */
export type Operand<V> = V | Expression<V | null>;

type Widen<V> = V extends string ? string : V extends number ? number : V extends boolean ? boolean : V;

const ALIAS_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertAlias(alias: string): void {
  if (!ALIAS_PATTERN.test(alias)) {
    throw new CompositionError(`Alias "${alias}" must match ${String(ALIAS_PATTERN)}`);
  }
}

function literalNode(value: unknown): ExpressionNode {
  if (value === null) return { kind: 'constant', value: null };
  if (typeof value === 'string' || typeof value === 'boolean' || value instanceof Date) {
    return { kind: 'constant', value };
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return { kind: 'constant', value };
  }
  throw new CompositionError(`Unsupported literal value: ${String(value)}`);
}

export function operandNode(value: unknown): ExpressionNode {
  return value instanceof AnyExpression ? value.node : literalNode(value);
}

function describe(node: ExpressionNode): string {
  return node.kind === 'field' ? `${node.entity}.${node.field}` : `${node.kind} expression`;
}

function requireType(node: ExpressionNode, allowed: readonly ValueType[], operator: string): void {
  const type = typeOf(node);
  if (type !== 'unknown' && !allowed.includes(type)) {
    throw new CompositionError(`Operator "${operator}" cannot be applied to ${describe(node)} of type ${type}`);
  }
}

function requireComparable(left: ExpressionNode, right: ExpressionNode, operator: string): void {
  const l = typeOf(left);
  const r = typeOf(right);
  if (l !== 'unknown' && r !== 'unknown' && l !== r) {
    throw new CompositionError(`Operator "${operator}" compares ${describe(left)} of type ${l} with a ${r} value`);
  }
}

function requireNonNull(node: ExpressionNode, operator: string): void {
  if (node.kind === 'constant' && node.value === null) {
    throw new CompositionError(`Operator "${operator}" does not accept null; use isNull() or isNotNull()`);
  }
}

/** Escapes LIKE wildcards (and the escape character) in user-supplied text. */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Any expression regardless of its value type: the node and its optional alias. */
export class AnyExpression {
  constructor(
    readonly node: ExpressionNode,
    readonly alias: string | null = null,
  ) {}
}

/**
 * Typed expression handle. `T` is the value type a row yields for this
 * expression; it is a compile-time marker only and appears in return
 * positions and method parameters, so `Expression<string>` is an
 * `Expression<string | null>`.
 */
export class Expression<T> extends AnyExpression {
  protected readonly valueType?: T;

  /** Names the expression for name-based projection binding. */
  as(alias: string): Expression<T> {
    assertAlias(alias);
    return new Expression<T>(this.node, alias);
  }

  eq(value: Operand<NonNullable<T>>): Predicate {
    return this.compare('eq', value);
  }

  ne(value: Operand<NonNullable<T>>): Predicate {
    return this.compare('ne', value);
  }

  gt(value: Operand<NonNullable<T>>): Predicate {
    return this.compare('gt', value);
  }

  goe(value: Operand<NonNullable<T>>): Predicate {
    return this.compare('goe', value);
  }

  lt(value: Operand<NonNullable<T>>): Predicate {
    return this.compare('lt', value);
  }

  loe(value: Operand<NonNullable<T>>): Predicate {
    return this.compare('loe', value);
  }

  /** Inclusive on both bounds. */
  between(low: Operand<NonNullable<T>>, high: Operand<NonNullable<T>>): Predicate {
    requireType(this.node, ['string', 'number', 'date'], 'between');
    const lowNode = operandNode(low);
    const highNode = operandNode(high);
    for (const bound of [lowNode, highNode]) {
      requireNonNull(bound, 'between');
      requireComparable(this.node, bound, 'between');
    }
    return new Predicate({ kind: 'between', operand: this.node, low: lowNode, high: highNode });
  }

  in(values: readonly NonNullable<T>[] | Expression<T | null>): Predicate {
    return this.membership(values, false);
  }

  notIn(values: readonly NonNullable<T>[] | Expression<T | null>): Predicate {
    return this.membership(values, true);
  }

  isNull(): Predicate {
    return new Predicate({ kind: 'null', operand: this.node, negated: false });
  }

  isNotNull(): Predicate {
    return new Predicate({ kind: 'null', operand: this.node, negated: true });
  }

  /** Raw LIKE pattern, passed through verbatim. The caller owns any escaping. */
  like(pattern: string): Predicate {
    return this.likeNode('like', pattern);
  }

  /** `%text%`, with wildcards in `text` escaped. */
  contains(text: string): Predicate {
    return this.likeNode('contains', `%${escapeLike(text)}%`);
  }

  /** `text%`, with wildcards in `text` escaped. */
  startsWith(text: string): Predicate {
    return this.likeNode('startsWith', `${escapeLike(text)}%`);
  }

  /** `%text`, with wildcards in `text` escaped. */
  endsWith(text: string): Predicate {
    return this.likeNode('endsWith', `%${escapeLike(text)}`);
  }

  asc(): OrderSpecifier {
    return new OrderSpecifier({ expr: this.node, direction: 'asc', nulls: 'default' });
  }

  desc(): OrderSpecifier {
    return new OrderSpecifier({ expr: this.node, direction: 'desc', nulls: 'default' });
  }

  concat(other: Operand<string>): Expression<string> {
    const parts = this.node.kind === 'concat' ? [...this.node.parts] : [this.node];
    parts.push(operandNode(other));
    return new Expression<string>({ kind: 'concat', parts });
  }

  stringValue(): Expression<string> {
    return new Expression<string>({ kind: 'stringValue', arg: this.node });
  }

  /** Starts a simple CASE on this expression: `age.when(10).then('ten')...otherwise('other')`. */
  when(value: Operand<NonNullable<T>>): FirstCaseWhen<Operand<NonNullable<T>>> {
    const conditions: ConditionFactory<Operand<NonNullable<T>>> = {
      condition: (v) => this.eq(v).node,
    };
    return new FirstCaseWhen([], conditions.condition(value), conditions);
  }

  count(): Expression<number> {
    return this.aggregate<number>('count');
  }

  countDistinct(): Expression<number> {
    return this.aggregate<number>('countDistinct');
  }

  sum(): Expression<number | null> {
    requireType(this.node, ['number'], 'sum');
    return this.aggregate<number | null>('sum');
  }

  avg(): Expression<number | null> {
    requireType(this.node, ['number'], 'avg');
    return this.aggregate<number | null>('avg');
  }

  max(): Expression<T | null> {
    return this.aggregate<T | null>('max');
  }

  min(): Expression<T | null> {
    return this.aggregate<T | null>('min');
  }

  private aggregate<R>(fn: AggregateFn): Expression<R> {
    return new Expression<R>({ kind: 'aggregate', fn, arg: this.node });
  }

  private compare(op: CompareOp, value: unknown): Predicate {
    const right = operandNode(value);
    requireNonNull(right, op);
    if (op !== 'eq' && op !== 'ne') {
      requireType(this.node, ['string', 'number', 'date'], op);
    }
    requireComparable(this.node, right, op);
    return new Predicate({ kind: 'compare', op, left: this.node, right });
  }

  private membership(values: readonly unknown[] | AnyExpression, negated: boolean): Predicate {
    const operator = negated ? 'notIn' : 'in';
    if (values instanceof AnyExpression) {
      if (values.node.kind !== 'subquery') {
        throw new CompositionError(`Operator "${operator}" takes a list of values or a sub-query`);
      }
      requireComparable(this.node, values.node, operator);
      return new Predicate({ kind: 'inQuery', operand: this.node, query: values.node.query, negated });
    }
    const list = values.map((v) => {
      const node = operandNode(v);
      requireNonNull(node, operator);
      requireComparable(this.node, node, operator);
      return node;
    });
    return new Predicate({ kind: 'in', operand: this.node, list, negated });
  }

  private likeNode(operator: string, pattern: string): Predicate {
    requireType(this.node, ['string'], operator);
    return new Predicate({ kind: 'like', operand: this.node, pattern });
  }
}

/** A sort key. Null placement is independent of the direction. */
export class OrderSpecifier {
  constructor(readonly spec: OrderSpec) {}

  nullsFirst(): OrderSpecifier {
    return this.withNulls('first');
  }

  nullsLast(): OrderSpecifier {
    return this.withNulls('last');
  }

  private withNulls(nulls: NullPlacement): OrderSpecifier {
    return new OrderSpecifier({ ...this.spec, nulls });
  }
}

/** Wraps a literal so it can be projected or compared like any expression. */
export function constant<V extends Literal>(value: V): Expression<Widen<V>> {
  return new Expression<Widen<V>>(literalNode(value));
}

/** Names any expression, sub-queries included. */
export function as<T>(expression: Expression<T>, alias: string): Expression<T> {
  return expression.as(alias);
}

/** Starts a searched CASE: `cases().when(pred).then(v)...otherwise(d)`. */
export function cases(): CaseStart {
  return new CaseStart();
}

/** Turns the argument of a later `when()` into a branch condition. */
export interface ConditionFactory<C> {
  condition(value: C): PredicateNode;
}

const searchedConditions: ConditionFactory<Predicate> = {
  condition: (p) => p.node,
};

export class CaseStart {
  when(condition: Predicate): FirstCaseWhen<Predicate> {
    return new FirstCaseWhen([], condition.node, searchedConditions);
  }
}

export class FirstCaseWhen<C> {
  constructor(
    private readonly branches: readonly CaseBranch[],
    private readonly condition: PredicateNode,
    private readonly conditions: ConditionFactory<C>,
  ) {}

  then<X>(value: X | Expression<X>): CaseBuilder<C, Widen<X>> {
    return new CaseBuilder<C, Widen<X>>(
      [...this.branches, { when: this.condition, then: operandNode(value) }],
      this.conditions,
    );
  }
}

export class CaseWhen<C, V> {
  constructor(
    private readonly branches: readonly CaseBranch[],
    private readonly condition: PredicateNode,
    private readonly conditions: ConditionFactory<C>,
  ) {}

  then(value: Operand<V>): CaseBuilder<C, V> {
    const node = operandNode(value);
    const first = this.branches[0];
    if (first !== undefined) requireComparable(first.then, node, 'then');
    return new CaseBuilder<C, V>(
      [...this.branches, { when: this.condition, then: node }],
      this.conditions,
    );
  }
}

export class CaseBuilder<C, V> {
  constructor(
    private readonly branches: readonly CaseBranch[],
    private readonly conditions: ConditionFactory<C>,
  ) {}

  when(condition: C): CaseWhen<C, V> {
    return new CaseWhen<C, V>(this.branches, this.conditions.condition(condition), this.conditions);
  }

  /** The mandatory default branch; closes the CASE. */
  otherwise(value: Operand<V>): Expression<V> {
    const node = operandNode(value);
    const first = this.branches[0];
    if (first !== undefined) requireComparable(first.then, node, 'otherwise');
    return new Expression<V>({ kind: 'case', branches: [...this.branches], otherwise: node });
  }
}

const subqueryIds = new WeakMap<QueryDescriptor, number>();
let nextSubqueryId = 1;

function subqueryKey(query: QueryDescriptor): string {
  let id = subqueryIds.get(query);
  if (id === undefined) {
    id = nextSubqueryId++;
    subqueryIds.set(query, id);
  }
  return `subquery#${id}`;
}

/**
 * Deterministic identity of an expression. Two structurally equal
 * expressions share a key; sub-queries are keyed by descriptor identity.
 */
export function expressionKey(node: ExpressionNode): string {
  switch (node.kind) {
    case 'field':
      return `${node.alias}.${node.field}`;
    case 'column':
      return `${node.alias}#${node.column}`;
    case 'constant': {
      const v = node.value;
      if (v === null) return 'null';
      if (v instanceof Date) return `date:${v.toISOString()}`;
      return `${typeof v}:${JSON.stringify(v)}`;
    }
    case 'aggregate':
      return `${node.fn}(${node.arg === null ? '*' : expressionKey(node.arg)})`;
    case 'concat':
      return `concat(${node.parts.map(expressionKey).join(',')})`;
    case 'stringValue':
      return `str(${expressionKey(node.arg)})`;
    case 'case': {
      const branches = node.branches.map((b) => `when ${predicateKey(b.when)} then ${expressionKey(b.then)}`);
      return `case(${branches.join(';')};else ${expressionKey(node.otherwise)})`;
    }
    case 'subquery':
      return subqueryKey(node.query);
  }
}

export function predicateKey(node: PredicateNode): string {
  switch (node.kind) {
    case 'true':
      return 'true';
    case 'compare':
      return `${node.op}(${expressionKey(node.left)},${expressionKey(node.right)})`;
    case 'between':
      return `between(${expressionKey(node.operand)},${expressionKey(node.low)},${expressionKey(node.high)})`;
    case 'in':
      return `${node.negated ? 'notIn' : 'in'}(${expressionKey(node.operand)},[${node.list.map(expressionKey).join(',')}])`;
    case 'inQuery':
      return `${node.negated ? 'notIn' : 'in'}(${expressionKey(node.operand)},${subqueryKey(node.query)})`;
    case 'null':
      return `${node.negated ? 'isNotNull' : 'isNull'}(${expressionKey(node.operand)})`;
    case 'like':
      return `like(${expressionKey(node.operand)},${JSON.stringify(node.pattern)})`;
    case 'and':
    case 'or':
      return `${node.kind}(${node.predicates.map(predicateKey).join(',')})`;
    case 'not':
      return `not(${predicateKey(node.predicate)})`;
  }
}
