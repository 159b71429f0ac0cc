import type pg from 'pg';
import { isLoaded } from '../projection/entity-record.js';
import type { EntityRecord } from '../projection/entity-record.js';
import { compileSelect } from '../query/compiler.js';
import type { DataSource, ExecutionRequest, ResultRow } from '../types.js';
import { mapRow } from './row-mapper.js';

export interface PostgresDataSourceConfig {
  pool: pg.Pool;
  /** End the pool on close(). Default true. */
  endPoolOnClose?: boolean;
}

/**
 * Runs queries against PostgreSQL through a caller-owned pg.Pool. Each
 * execution is a single parameterised SELECT; pool errors propagate as-is.
 */
export class PostgresDataSource implements DataSource {
  private readonly pool: pg.Pool;
  private readonly endPoolOnClose: boolean;

  constructor(config: PostgresDataSourceConfig) {
    this.pool = config.pool;
    this.endPoolOnClose = config.endPoolOnClose ?? true;
  }

  async execute(request: ExecutionRequest): Promise<ResultRow[]> {
    const { sql, params } = compileSelect(request);
    const result = await this.pool.query<unknown[]>({ text: sql, values: params, rowMode: 'array' });
    return result.rows.map((row) => mapRow(row, request.columns));
  }

  isLoaded(record: EntityRecord, relation: string): boolean {
    return isLoaded(record, relation);
  }

  async close(): Promise<void> {
    if (this.endPoolOnClose) {
      await this.pool.end();
    }
  }
}
