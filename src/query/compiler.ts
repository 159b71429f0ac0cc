import type { ExecutionRequest } from '../types.js';
import { joinKeys } from './plan.js';
import type {
  AggregateFn,
  CompareOp,
  ExpressionNode,
  JoinKind,
  OrderSpec,
  PredicateNode,
  QueryDescriptor,
  SourceRef,
} from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/** Shared by recursive calls so nested sub-queries continue the same $n sequence. */
interface CompileContext {
  params: unknown[];
  counter: { n: number };
}

const COMPARE_SQL: Record<CompareOp, string> = {
  eq: '=',
  ne: '<>',
  gt: '>',
  goe: '>=',
  lt: '<',
  loe: '<=',
};

const AGGREGATE_SQL: Record<Exclude<AggregateFn, 'countDistinct'>, string> = {
  count: 'COUNT',
  sum: 'SUM',
  avg: 'AVG',
  max: 'MAX',
  min: 'MIN',
};

const JOIN_SQL: Record<JoinKind, string> = {
  inner: 'INNER JOIN',
  left: 'LEFT JOIN',
  right: 'RIGHT JOIN',
};

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function bind(value: unknown, ctx: CompileContext): string {
  ctx.params.push(value);
  ctx.counter.n += 1;
  return `$${ctx.counter.n}`;
}

function castFor(value: string | number | boolean | Date): string {
  if (value instanceof Date) return 'timestamptz';
  if (typeof value === 'string') return 'text';
  if (typeof value === 'number') return 'numeric';
  return 'boolean';
}

function compileExpression(node: ExpressionNode, ctx: CompileContext): string {
  switch (node.kind) {
    case 'field':
    case 'column':
      return `${quoteIdent(node.alias)}.${quoteIdent(node.column)}`;
    case 'constant':
      // Explicit casts keep parameter types stable inside CASE and the select list
      return node.value === null ? 'NULL' : `${bind(node.value, ctx)}::${castFor(node.value)}`;
    case 'aggregate': {
      if (node.arg === null) return 'COUNT(*)';
      const arg = compileExpression(node.arg, ctx);
      return node.fn === 'countDistinct' ? `COUNT(DISTINCT ${arg})` : `${AGGREGATE_SQL[node.fn]}(${arg})`;
    }
    case 'concat':
      return `(${node.parts.map((p) => compileExpression(p, ctx)).join(' || ')})`;
    case 'stringValue':
      return `CAST(${compileExpression(node.arg, ctx)} AS TEXT)`;
    case 'case': {
      const branches = node.branches.map(
        (b) => `WHEN ${compilePredicate(b.when, ctx)} THEN ${compileExpression(b.then, ctx)}`,
      );
      return `CASE ${branches.join(' ')} ELSE ${compileExpression(node.otherwise, ctx)} END`;
    }
    case 'subquery':
      return `(${compileSubquery(node.query, ctx)})`;
  }
}

function compilePredicate(node: PredicateNode, ctx: CompileContext): string {
  switch (node.kind) {
    case 'true':
      return 'TRUE';
    case 'compare':
      return `${compileExpression(node.left, ctx)} ${COMPARE_SQL[node.op]} ${compileExpression(node.right, ctx)}`;
    case 'between':
      return `${compileExpression(node.operand, ctx)} BETWEEN ${compileExpression(node.low, ctx)} AND ${compileExpression(node.high, ctx)}`;
    case 'in': {
      if (node.list.length === 0) return node.negated ? 'TRUE' : 'FALSE';
      const operand = compileExpression(node.operand, ctx);
      const list = node.list.map((v) => compileExpression(v, ctx)).join(', ');
      return `${operand} ${node.negated ? 'NOT IN' : 'IN'} (${list})`;
    }
    case 'inQuery': {
      const operand = compileExpression(node.operand, ctx);
      return `${operand} ${node.negated ? 'NOT IN' : 'IN'} (${compileSubquery(node.query, ctx)})`;
    }
    case 'null':
      return `${compileExpression(node.operand, ctx)} IS ${node.negated ? 'NOT NULL' : 'NULL'}`;
    case 'like':
      return `${compileExpression(node.operand, ctx)} LIKE ${bind(node.pattern, ctx)} ESCAPE '\\'`;
    case 'and':
      return `(${node.predicates.map((p) => compilePredicate(p, ctx)).join(' AND ')})`;
    case 'or':
      return `(${node.predicates.map((p) => compilePredicate(p, ctx)).join(' OR ')})`;
    case 'not':
      return `NOT (${compilePredicate(node.predicate, ctx)})`;
  }
}

function compileOrder(order: OrderSpec, ctx: CompileContext): string {
  const nulls = order.nulls === 'first' ? ' NULLS FIRST' : ' NULLS LAST';
  return `${compileExpression(order.expr, ctx)} ${order.direction === 'asc' ? 'ASC' : 'DESC'}${nulls}`;
}

function tableRef(source: SourceRef): string {
  return `${quoteIdent(source.entity.table)} AS ${quoteIdent(source.alias)}`;
}

function compileBody(
  descriptor: QueryDescriptor,
  columns: readonly ExpressionNode[],
  ctx: CompileContext,
): string {
  const lines = [`SELECT ${columns.map((c) => compileExpression(c, ctx)).join(', ')}`];

  descriptor.from.forEach((source, i) => {
    // CROSS JOIN rather than a comma, so later ON clauses may reference every source
    lines.push(i === 0 ? `FROM ${tableRef(source)}` : `CROSS JOIN ${tableRef(source)}`);
  });

  for (const join of descriptor.joins) {
    const conditions: string[] = [];
    const keys = joinKeys(descriptor, join);
    if (keys !== null) {
      conditions.push(
        `${quoteIdent(keys.ownerAlias)}.${quoteIdent(keys.ownerColumn)} = ${quoteIdent(join.target.alias)}.${quoteIdent(keys.targetColumn)}`,
      );
    }
    if (join.on !== null) {
      conditions.push(compilePredicate(join.on, ctx));
    }
    const on = conditions.length === 0 ? 'TRUE' : conditions.join(' AND ');
    lines.push(`${JOIN_SQL[join.kind]} ${tableRef(join.target)} ON ${on}`);
  }

  if (descriptor.where !== null && descriptor.where.kind !== 'true') {
    lines.push(`WHERE ${compilePredicate(descriptor.where, ctx)}`);
  }
  if (descriptor.groupBy.length > 0) {
    lines.push(`GROUP BY ${descriptor.groupBy.map((g) => compileExpression(g, ctx)).join(', ')}`);
  }
  if (descriptor.having !== null && descriptor.having.kind !== 'true') {
    lines.push(`HAVING ${compilePredicate(descriptor.having, ctx)}`);
  }
  if (descriptor.orderBy.length > 0) {
    lines.push(`ORDER BY ${descriptor.orderBy.map((o) => compileOrder(o, ctx)).join(', ')}`);
  }
  if (descriptor.limit !== null) {
    lines.push(`LIMIT ${bind(descriptor.limit, ctx)}`);
  }
  if (descriptor.offset !== null) {
    lines.push(`OFFSET ${bind(descriptor.offset, ctx)}`);
  }

  return lines.join('\n');
}

function compileSubquery(descriptor: QueryDescriptor, ctx: CompileContext): string {
  const columns = descriptor.select.flatMap((item) => (item.kind === 'expression' ? [item.expr] : []));
  return compileBody(descriptor, columns, ctx);
}

/**
 * Compiles an execution request into one parameterised PostgreSQL SELECT.
 * Columns come out in request order; callers read rows in array mode.
 */
export function compileSelect(request: ExecutionRequest): CompiledQuery {
  const ctx: CompileContext = { params: [], counter: { n: 0 } };
  const sql = compileBody(request.descriptor, request.columns, ctx);
  return { sql, params: ctx.params };
}
