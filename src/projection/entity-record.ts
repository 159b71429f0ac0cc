import { CompositionError } from '../errors.js';
import type { EntityHydration } from '../query/plan.js';

/** A materialized entity row keyed by field name. Frozen on creation. */
export type EntityRecord = Readonly<Record<string, unknown>>;

const recordEntities = new WeakMap<object, string>();

/** An unloaded many-to-one relation: target entity and identity only. */
export class LazyReference {
  constructor(
    readonly entity: string,
    readonly id: unknown,
  ) {
    Object.freeze(this);
  }
}

/** An unloaded one-to-many relation. */
export class LazyCollection {
  constructor(
    readonly entity: string,
    readonly mappedBy: string,
    readonly ownerId: unknown,
  ) {
    Object.freeze(this);
  }
}

export function isEntityRecord(value: unknown): value is EntityRecord {
  return typeof value === 'object' && value !== null && recordEntities.has(value);
}

export function entityNameOf(record: EntityRecord): string | undefined {
  return recordEntities.get(record);
}

/**
 * Reports whether a relation value on a record is materialized. A null
 * relation counts as loaded: there is nothing left to read.
 */
export function isLoaded(record: EntityRecord, relation: string): boolean {
  if (!(relation in record)) {
    throw new CompositionError(`Record of ${entityNameOf(record) ?? 'unknown entity'} has no field "${relation}"`);
  }
  const value = record[relation];
  return !(value instanceof LazyReference || value instanceof LazyCollection);
}

/** Rebuilds one entity (and its fetched relations) from a positional row. Null identity → null. */
export function hydrateEntity(row: readonly unknown[], plan: EntityHydration): EntityRecord | null {
  const id = row[plan.idIndex] ?? null;
  if (id === null) return null;

  const values: Record<string, unknown> = {};
  for (const { name, index } of plan.scalars) {
    values[name] = row[index] ?? null;
  }
  for (const { field, index, fetched } of plan.references) {
    const fk = row[index] ?? null;
    if (fk === null) {
      values[field.name] = null;
      continue;
    }
    // An outer fetch join may find no row (ON filter); the relation stays unloaded then
    const loaded = fetched === null ? null : hydrateEntity(row, fetched);
    values[field.name] = loaded ?? new LazyReference(field.target, fk);
  }
  for (const rel of plan.entity.oneToManyFields) {
    values[rel.name] = new LazyCollection(rel.target, rel.mappedBy, id);
  }

  const record: EntityRecord = Object.freeze(values);
  recordEntities.set(record, plan.entity.name);
  return record;
}
