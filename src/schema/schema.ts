import { SchemaError } from '../errors.js';
import type { EntitySchema } from './entity.js';

/**
 * A closed set of entities whose relations have been checked against each
 * other.
 */
export interface Schema {
  readonly entities: readonly EntitySchema[];
  entity(name: string): EntitySchema;
}

export function defineSchema(entities: readonly EntitySchema[]): Schema {
  const byName = new Map<string, EntitySchema>();
  for (const e of entities) {
    if (byName.has(e.name)) {
      throw new SchemaError(`defineSchema: entity "${e.name}" is declared twice`);
    }
    byName.set(e.name, e);
  }

  for (const e of entities) {
    for (const rel of e.manyToOneFields) {
      if (!byName.has(rel.target)) {
        throw new SchemaError(`${e.name}.${rel.name}: unknown target entity "${rel.target}"`);
      }
    }
    for (const rel of e.oneToManyFields) {
      const target = byName.get(rel.target);
      if (target === undefined) {
        throw new SchemaError(`${e.name}.${rel.name}: unknown target entity "${rel.target}"`);
      }
      const owner = target.field(rel.mappedBy);
      if (owner === undefined || owner.kind !== 'manyToOne' || owner.target !== e.name) {
        throw new SchemaError(
          `${e.name}.${rel.name}: mappedBy "${rel.mappedBy}" must be a many-to-one field of ${target.name} targeting ${e.name}`,
        );
      }
    }
  }

  return {
    entities: [...entities],
    entity(name: string): EntitySchema {
      const found = byName.get(name);
      if (found === undefined) {
        throw new SchemaError(`Unknown entity "${name}"`);
      }
      return found;
    },
  };
}
