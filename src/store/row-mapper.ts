import type { ExpressionNode } from '../query/types.js';
import { typeOf } from '../query/types.js';
import type { ResultRow } from '../types.js';

/**
 * Normalises one array-mode pg row against the column plan. pg returns
 * BIGINT and NUMERIC (COUNT, SUM, AVG) as strings; columns the query typed
 * as numbers come back as numbers.
 */
export function mapRow(row: readonly unknown[], columns: readonly ExpressionNode[]): ResultRow {
  return columns.map((column, i) => {
    const value = row[i] ?? null;
    if (typeof value === 'string' && typeOf(column) === 'number') {
      return Number(value);
    }
    return value;
  });
}
