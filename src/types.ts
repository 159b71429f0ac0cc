import type { EntityRecord } from './projection/entity-record.js';
import type { ExpressionNode, QueryDescriptor } from './query/types.js';

/** A validated query plus the flattened column list the rows must follow. */
export interface ExecutionRequest {
  readonly descriptor: QueryDescriptor;
  readonly columns: readonly ExpressionNode[];
}

/** One value per entry of ExecutionRequest.columns, in the same order. */
export type ResultRow = readonly unknown[];

/**
 * The relational store a query runs against. Supplied per unit of work;
 * connection handling, timeouts and retries belong to the implementation.
 */
export interface DataSource {
  execute(request: ExecutionRequest): Promise<ResultRow[]>;
  /** Whether a relation on a record this source produced is already materialized. */
  isLoaded(record: EntityRecord, relation: string): boolean;
  close(): Promise<void>;
}

export interface QueryEvent {
  descriptor: QueryDescriptor;
  rowCount: number;
  durationMs: number;
}
