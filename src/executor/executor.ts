import { NonUniqueResultError } from '../errors.js';
import { hydrateEntity } from '../projection/entity-record.js';
import type { EntityRecord } from '../projection/entity-record.js';
import type { Query } from '../query/builder.js';
import { planColumns } from '../query/plan.js';
import type { ColumnPlan } from '../query/plan.js';
import type { QueryDescriptor } from '../query/types.js';
import { validateQuery } from '../query/validate.js';
import type { DataSource, QueryEvent, ResultRow } from '../types.js';

export interface QueryExecutorConfig {
  source: DataSource;
  /** Called after every successful round trip. */
  onQuery?: (event: QueryEvent) => void;
  /** Called with data-source failures before they are rethrown. */
  onError?: (error: unknown, descriptor: QueryDescriptor) => void;
}

interface ResolvedConfig {
  onQuery: ((event: QueryEvent) => void) | null;
  onError: (error: unknown, descriptor: QueryDescriptor) => void;
}

function capLimit(descriptor: QueryDescriptor, cap: number): QueryDescriptor {
  const limit = descriptor.limit === null ? cap : Math.min(descriptor.limit, cap);
  return { ...descriptor, limit };
}

/**
 * Runs queries against one data source and maps rows to the query's
 * projection. Holds no state between calls; every fetch is exactly one
 * data-source round trip.
 */
export class QueryExecutor {
  private readonly source: DataSource;
  private readonly resolved: ResolvedConfig;

  constructor(config: QueryExecutorConfig) {
    this.source = config.source;
    this.resolved = {
      onQuery: config.onQuery ?? null,
      onError: config.onError ?? ((err) => {
        console.error('[relquery] query failed:', err);
      }),
    };
  }

  /** Every matching row, in query order. Empty when nothing matches. */
  async fetchAll<R>(query: Query<R>): Promise<R[]> {
    return this.run(query, query.descriptor);
  }

  /**
   * The single matching row, or null when there is none.
   * @throws NonUniqueResultError when two or more rows match
   */
  async fetchOne<R>(query: Query<R>): Promise<R | null> {
    const results = await this.run(query, capLimit(query.descriptor, 2));
    if (results.length > 1) {
      throw new NonUniqueResultError(results.length);
    }
    return results[0] ?? null;
  }

  /** The first row under the query's ordering, or null. */
  async fetchFirst<R>(query: Query<R>): Promise<R | null> {
    const results = await this.run(query, capLimit(query.descriptor, 1));
    return results[0] ?? null;
  }

  /** Whether a relation on a record produced by this executor's source is materialized. */
  isLoaded(record: EntityRecord, relation: string): boolean {
    return this.source.isLoaded(record, relation);
  }

  private async run<R>(query: Query<R>, descriptor: QueryDescriptor): Promise<R[]> {
    validateQuery(descriptor);
    const plan = planColumns(descriptor);

    const started = performance.now();
    let rows: ResultRow[];
    try {
      rows = await this.source.execute({ descriptor, columns: plan.columns });
    } catch (err) {
      this.resolved.onError(err, descriptor);
      throw err;
    }
    this.resolved.onQuery?.({ descriptor, rowCount: rows.length, durationMs: performance.now() - started });

    return rows.map((row) => query.projection.create(itemValues(row, plan)));
  }
}

function itemValues(row: ResultRow, plan: ColumnPlan): unknown[] {
  return plan.slots.map((slot) =>
    slot.kind === 'value' ? (row[slot.index] ?? null) : hydrateEntity(row, slot.hydration),
  );
}
