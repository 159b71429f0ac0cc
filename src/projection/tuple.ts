import { CompositionError } from '../errors.js';
import { expressionKey } from '../query/expressions.js';
import type { AnyExpression, Expression } from '../query/expressions.js';
import { EntityPath } from '../query/paths.js';
import type { SelectItem } from '../query/types.js';
import { isEntityRecord } from './entity-record.js';
import type { EntityRecord } from './entity-record.js';

export function itemKey(item: SelectItem): string {
  return item.kind === 'entity' ? `entity:${item.alias}` : expressionKey(item.expr);
}

/**
 * One row of a multi-column projection. Columns are addressed by position or
 * by the expression that produced them; an alias does not change identity.
 */
export class Tuple {
  constructor(
    private readonly keys: readonly string[],
    private readonly values: readonly unknown[],
  ) {
    Object.freeze(this);
  }

  get size(): number {
    return this.values.length;
  }

  get<T>(expression: Expression<T>): T;
  get(entity: EntityPath): EntityRecord | null;
  get(index: number): unknown;
  get(target: AnyExpression | EntityPath | number): unknown {
    if (typeof target === 'number') {
      if (!Number.isInteger(target) || target < 0 || target >= this.values.length) {
        throw new RangeError(`Tuple index ${target} out of range (size ${this.values.length})`);
      }
      return this.values[target];
    }

    const key = target instanceof EntityPath ? `entity:${target.alias}` : expressionKey(target.node);
    const index = this.keys.indexOf(key);
    if (index === -1) {
      throw new CompositionError(`Expression ${key} is not part of this tuple`);
    }
    const value = this.values[index];
    if (target instanceof EntityPath) {
      return isEntityRecord(value) ? value : null;
    }
    return value;
  }

  toArray(): unknown[] {
    return [...this.values];
  }
}
