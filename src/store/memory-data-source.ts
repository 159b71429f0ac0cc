import { isLoaded } from '../projection/entity-record.js';
import type { EntityRecord } from '../projection/entity-record.js';
import { joinKeys } from '../query/plan.js';
import {
  containsAggregate,
  predicateContainsAggregate,
} from '../query/types.js';
import type {
  CompareOp,
  ExpressionNode,
  OrderSpec,
  PredicateNode,
  QueryDescriptor,
} from '../query/types.js';
import type { EntitySchema } from '../schema/entity.js';
import type { Schema } from '../schema/schema.js';
import type { DataSource, ExecutionRequest, ResultRow } from '../types.js';

export class QueryEvaluationError extends Error {
  override readonly name = 'QueryEvaluationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Physical row keyed by column name. */
type StoredRow = Readonly<Record<string, unknown>>;

/** One joined row: alias → stored row, or null where an outer join found nothing. */
type Env = ReadonlyMap<string, StoredRow | null>;

interface EvalContext {
  env: Env;
  /** Rows of the current group; null outside grouping. */
  group: readonly Env[] | null;
}

/** SQL three-valued boolean: null is UNKNOWN. */
type Truth = boolean | null;

export interface MemoryDataSourceConfig {
  schema: Schema;
}

function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  throw new QueryEvaluationError(`Cannot compare ${describe(a)} with ${describe(b)}`);
}

function describe(value: unknown): string {
  return value instanceof Date ? 'date' : typeof value;
}

function applyCompare(op: CompareOp, left: unknown, right: unknown): Truth {
  if (left === null || right === null) return null;
  const c = compareValues(left, right);
  switch (op) {
    case 'eq':
      return c === 0;
    case 'ne':
      return c !== 0;
    case 'gt':
      return c > 0;
    case 'goe':
      return c >= 0;
    case 'lt':
      return c < 0;
    case 'loe':
      return c <= 0;
  }
}

function and(values: readonly Truth[]): Truth {
  if (values.includes(false)) return false;
  return values.includes(null) ? null : true;
}

function or(values: readonly Truth[]): Truth {
  if (values.includes(true)) return true;
  return values.includes(null) ? null : false;
}

/** `x IN (list)`: true on a match, UNKNOWN when only a null could have matched. */
function memberOf(value: unknown, list: readonly unknown[]): Truth {
  if (list.length === 0) return false;
  if (value === null) return null;
  return or(list.map((item) => applyCompare('eq', value, item)));
}

/** LIKE pattern → anchored RegExp, with backslash as the escape character. */
export function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '\\' && i + 1 < pattern.length) {
      i += 1;
      source += escapeRegExp(pattern.charAt(i));
    } else if (ch === '%') {
      source += '.*';
    } else if (ch === '_') {
      source += '.';
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function escapeRegExp(ch: string): string {
  return ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function toText(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function groupKey(values: readonly unknown[]): string {
  return JSON.stringify(values.map((v) => (v instanceof Date ? { date: v.getTime() } : v)));
}

/**
 * In-process relational evaluator over in-memory tables. Follows SQL
 * semantics for NULL, joins, grouping and ordering so queries behave as they
 * do against PostgreSQL.
 */
export class MemoryDataSource implements DataSource {
  private readonly schema: Schema;
  private readonly tables = new Map<string, StoredRow[]>();
  private readonly sequences = new Map<string, number>();
  private closed = false;

  constructor(config: MemoryDataSourceConfig) {
    this.schema = config.schema;
    for (const entity of this.schema.entities) {
      this.tables.set(entity.name, []);
      this.sequences.set(entity.name, 0);
    }
  }

  /**
   * Stores one row. Values are keyed by field name; many-to-one fields take
   * the target's identity. A missing numeric identity is generated.
   * Returns the stored identity.
   */
  insert(entity: EntitySchema | string, values: Readonly<Record<string, unknown>>): unknown {
    const schema = this.schema.entity(typeof entity === 'string' ? entity : entity.name);
    const rows = this.tableOf(schema.name);

    for (const name of Object.keys(values)) {
      const f = schema.field(name);
      if (f === undefined || f.kind === 'oneToMany') {
        throw new QueryEvaluationError(`${schema.name} has no storable field "${name}"`);
      }
    }

    const row: Record<string, unknown> = {};
    for (const f of schema.scalarFields) {
      let value = values[f.name] ?? null;
      if (f === schema.idField && value === null && f.type === 'number') {
        value = (this.sequences.get(schema.name) ?? 0) + 1;
      }
      if (value === null && (!f.nullable || f === schema.idField)) {
        throw new QueryEvaluationError(`${schema.name}.${f.name} must not be null`);
      }
      row[f.column] = value;
    }
    for (const f of schema.manyToOneFields) {
      row[f.joinColumn] = values[f.name] ?? null;
    }

    const id = row[schema.idField.column];
    if (rows.some((existing) => applyCompare('eq', existing[schema.idField.column], id) === true)) {
      throw new QueryEvaluationError(`${schema.name} with id ${String(id)} already exists`);
    }
    if (typeof id === 'number') {
      this.sequences.set(schema.name, Math.max(this.sequences.get(schema.name) ?? 0, id));
    }
    rows.push(Object.freeze(row));
    return id;
  }

  async execute(request: ExecutionRequest): Promise<ResultRow[]> {
    if (this.closed) {
      throw new QueryEvaluationError('Data source is closed');
    }
    return this.run(request.descriptor, request.columns, new Map<string, StoredRow | null>());
  }

  isLoaded(record: EntityRecord, relation: string): boolean {
    return isLoaded(record, relation);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private tableOf(entity: string): StoredRow[] {
    const rows = this.tables.get(entity);
    if (rows === undefined) {
      throw new QueryEvaluationError(`No table for entity "${entity}"`);
    }
    return rows;
  }

  private run(descriptor: QueryDescriptor, columns: readonly ExpressionNode[], outer: Env): ResultRow[] {
    let envs = this.joinedRows(descriptor, outer);

    if (descriptor.where !== null) {
      const where = descriptor.where;
      envs = envs.filter((env) => this.test(where, { env, group: null }) === true);
    }

    let contexts = this.grouped(descriptor, columns, envs, outer);

    if (descriptor.having !== null) {
      const having = descriptor.having;
      contexts = contexts.filter((ctx) => this.test(having, ctx) === true);
    }

    if (descriptor.orderBy.length > 0) {
      contexts = this.sorted(descriptor.orderBy, contexts);
    }

    const start = descriptor.offset ?? 0;
    const end = descriptor.limit === null ? undefined : start + descriptor.limit;
    return contexts.slice(start, end).map((ctx) => columns.map((c) => this.value(c, ctx)));
  }

  /** FROM sources as a cross product, then each join in declaration order. */
  private joinedRows(descriptor: QueryDescriptor, outer: Env): Env[] {
    let envs: Env[] = [outer];
    const declared: string[] = [];

    for (const source of descriptor.from) {
      const rows = this.tableOf(source.entity.name);
      envs = envs.flatMap((env) => rows.map((row) => new Map(env).set(source.alias, row)));
      declared.push(source.alias);
    }

    for (const join of descriptor.joins) {
      const targets = this.tableOf(join.target.entity.name);
      const keys = joinKeys(descriptor, join);
      const matches = (env: Env, target: StoredRow): boolean => {
        const candidate = new Map(env).set(join.target.alias, target);
        const keyed =
          keys === null ||
          applyCompare('eq', candidate.get(keys.ownerAlias)?.[keys.ownerColumn] ?? null, target[keys.targetColumn] ?? null) === true;
        return keyed && (join.on === null || this.test(join.on, { env: candidate, group: null }) === true);
      };

      const next: Env[] = [];
      const matchedTargets = new Set<StoredRow>();
      for (const env of envs) {
        let found = false;
        for (const target of targets) {
          if (matches(env, target)) {
            found = true;
            matchedTargets.add(target);
            next.push(new Map(env).set(join.target.alias, target));
          }
        }
        if (!found && join.kind === 'left') {
          next.push(new Map(env).set(join.target.alias, null));
        }
      }
      if (join.kind === 'right') {
        for (const target of targets) {
          if (matchedTargets.has(target)) continue;
          const env = new Map(outer);
          for (const alias of declared) env.set(alias, null);
          next.push(env.set(join.target.alias, target));
        }
      }
      envs = next;
      declared.push(join.target.alias);
    }

    return envs;
  }

  private grouped(
    descriptor: QueryDescriptor,
    columns: readonly ExpressionNode[],
    envs: readonly Env[],
    outer: Env,
  ): EvalContext[] {
    const aggregated =
      descriptor.groupBy.length > 0 ||
      columns.some(containsAggregate) ||
      (descriptor.having !== null && predicateContainsAggregate(descriptor.having)) ||
      descriptor.orderBy.some((o) => containsAggregate(o.expr));
    if (!aggregated) {
      return envs.map((env) => ({ env, group: null }));
    }

    if (descriptor.groupBy.length === 0) {
      // Aggregating without GROUP BY always yields exactly one row
      const empty = new Map(outer);
      for (const alias of [...descriptor.from.map((s) => s.alias), ...descriptor.joins.map((j) => j.target.alias)]) {
        empty.set(alias, null);
      }
      return [{ env: envs[0] ?? empty, group: envs }];
    }

    const groups = new Map<string, Env[]>();
    for (const env of envs) {
      const key = groupKey(descriptor.groupBy.map((g) => this.value(g, { env, group: null })));
      const members = groups.get(key);
      if (members === undefined) {
        groups.set(key, [env]);
      } else {
        members.push(env);
      }
    }
    return [...groups.values()].flatMap((members) => {
      const first = members[0];
      return first === undefined ? [] : [{ env: first, group: members }];
    });
  }

  private sorted(orderBy: readonly OrderSpec[], contexts: readonly EvalContext[]): EvalContext[] {
    const keyed = contexts.map((ctx) => ({ ctx, keys: orderBy.map((o) => this.value(o.expr, ctx)) }));
    keyed.sort((a, b) => {
      for (const [i, order] of orderBy.entries()) {
        const av = a.keys[i] ?? null;
        const bv = b.keys[i] ?? null;
        if (av === null && bv === null) continue;
        if (av === null || bv === null) {
          // Nulls go last in both directions unless nullsFirst() asks otherwise
          const nullsFirst = order.nulls === 'first';
          return (av === null) === nullsFirst ? -1 : 1;
        }
        const c = compareValues(av, bv);
        if (c !== 0) return order.direction === 'asc' ? c : -c;
      }
      return 0;
    });
    return keyed.map((k) => k.ctx);
  }

  private scalarSubquery(query: QueryDescriptor, ctx: EvalContext): unknown {
    const values = this.subqueryValues(query, ctx);
    if (values.length > 1) {
      throw new QueryEvaluationError(`Scalar sub-query returned ${values.length} rows`);
    }
    return values[0] ?? null;
  }

  private subqueryValues(query: QueryDescriptor, ctx: EvalContext): unknown[] {
    const columns = query.select.flatMap((item) => (item.kind === 'expression' ? [item.expr] : []));
    return this.run(query, columns, ctx.env).map((row) => row[0] ?? null);
  }

  private value(node: ExpressionNode, ctx: EvalContext): unknown {
    switch (node.kind) {
      case 'field':
      case 'column': {
        if (!ctx.env.has(node.alias)) {
          throw new QueryEvaluationError(`Alias "${node.alias}" is not bound`);
        }
        return ctx.env.get(node.alias)?.[node.column] ?? null;
      }
      case 'constant':
        return node.value;
      case 'aggregate':
        return this.aggregate(node, ctx);
      case 'concat': {
        const parts = node.parts.map((p) => this.value(p, ctx));
        return parts.some((p) => p === null) ? null : parts.map(toText).join('');
      }
      case 'stringValue': {
        const v = this.value(node.arg, ctx);
        return v === null ? null : toText(v);
      }
      case 'case': {
        for (const branch of node.branches) {
          if (this.test(branch.when, ctx) === true) return this.value(branch.then, ctx);
        }
        return this.value(node.otherwise, ctx);
      }
      case 'subquery':
        return this.scalarSubquery(node.query, ctx);
    }
  }

  private aggregate(node: Extract<ExpressionNode, { kind: 'aggregate' }>, ctx: EvalContext): unknown {
    if (ctx.group === null) {
      throw new QueryEvaluationError(`${node.fn}() used outside an aggregating query`);
    }
    const arg = node.arg;
    if (arg === null) return ctx.group.length;

    const values = ctx.group
      .map((env) => this.value(arg, { env, group: null }))
      .filter((v) => v !== null);

    switch (node.fn) {
      case 'count':
        return values.length;
      case 'countDistinct':
        return new Set(values.map((v) => groupKey([v]))).size;
      case 'sum':
      case 'avg': {
        if (values.length === 0) return null;
        let total = 0;
        for (const v of values) {
          if (typeof v !== 'number') {
            throw new QueryEvaluationError(`${node.fn}() needs numbers, got ${describe(v)}`);
          }
          total += v;
        }
        return node.fn === 'sum' ? total : total / values.length;
      }
      case 'max':
      case 'min': {
        let best: unknown = null;
        for (const v of values) {
          if (best === null) {
            best = v;
            continue;
          }
          const c = compareValues(v, best);
          if (node.fn === 'max' ? c > 0 : c < 0) best = v;
        }
        return best;
      }
    }
  }

  private test(node: PredicateNode, ctx: EvalContext): Truth {
    switch (node.kind) {
      case 'true':
        return true;
      case 'compare':
        return applyCompare(node.op, this.value(node.left, ctx), this.value(node.right, ctx));
      case 'between': {
        const v = this.value(node.operand, ctx);
        return and([
          applyCompare('goe', v, this.value(node.low, ctx)),
          applyCompare('loe', v, this.value(node.high, ctx)),
        ]);
      }
      case 'in': {
        const result = memberOf(
          this.value(node.operand, ctx),
          node.list.map((item) => this.value(item, ctx)),
        );
        return node.negated ? not(result) : result;
      }
      case 'inQuery': {
        const result = memberOf(this.value(node.operand, ctx), this.subqueryValues(node.query, ctx));
        return node.negated ? not(result) : result;
      }
      case 'null': {
        const isNull = this.value(node.operand, ctx) === null;
        return node.negated ? !isNull : isNull;
      }
      case 'like': {
        const v = this.value(node.operand, ctx);
        return v === null ? null : likeToRegExp(node.pattern).test(toText(v));
      }
      case 'and':
        return and(node.predicates.map((p) => this.test(p, ctx)));
      case 'or':
        return or(node.predicates.map((p) => this.test(p, ctx)));
      case 'not':
        return not(this.test(node.predicate, ctx));
    }
  }
}

function not(value: Truth): Truth {
  return value === null ? null : !value;
}

