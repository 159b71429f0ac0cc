import { CompositionError } from '../errors.js';
import type { EntitySchema, RelationField, ScalarField, ScalarType } from '../schema/entity.js';
import { Expression, assertAlias } from './expressions.js';
import type { SourceRef } from './types.js';

/** Handle on one scalar field of an aliased entity. */
export class FieldPath<T> extends Expression<T | null> {
  constructor(
    readonly owner: EntityPath,
    readonly field: ScalarField,
  ) {
    super({
      kind: 'field',
      alias: owner.alias,
      entity: owner.entity.name,
      field: field.name,
      column: field.column,
      type: field.type,
    });
  }
}

/** Handle on a relation field, used as the first argument of a join. */
export class RelationPath {
  constructor(
    readonly owner: EntityPath,
    readonly field: RelationField,
  ) {}
}

/**
 * An entity bound under an alias. Field handles are resolved against the
 * entity schema when they are requested, so an unknown field or a field
 * read as the wrong type fails at composition time.
 */
export class EntityPath {
  constructor(
    readonly entity: EntitySchema,
    readonly alias: string,
  ) {
    assertAlias(alias);
  }

  get ref(): SourceRef {
    return { alias: this.alias, entity: this.entity };
  }

  string(name: string): FieldPath<string> {
    return new FieldPath<string>(this, this.scalar(name, 'string'));
  }

  number(name: string): FieldPath<number> {
    return new FieldPath<number>(this, this.scalar(name, 'number'));
  }

  boolean(name: string): FieldPath<boolean> {
    return new FieldPath<boolean>(this, this.scalar(name, 'boolean'));
  }

  date(name: string): FieldPath<Date> {
    return new FieldPath<Date>(this, this.scalar(name, 'date'));
  }

  relation(name: string): RelationPath {
    const f = this.entity.field(name);
    if (f === undefined || f.kind === 'scalar') {
      throw new CompositionError(`${this.entity.name}.${name} is not a relation field`);
    }
    return new RelationPath(this, f);
  }

  /** Row count of this entity (count of its identity). */
  count(): Expression<number> {
    return new Expression<number>({
      kind: 'aggregate',
      fn: 'count',
      arg: {
        kind: 'field',
        alias: this.alias,
        entity: this.entity.name,
        field: this.entity.idField.name,
        column: this.entity.idField.column,
        type: this.entity.idField.type,
      },
    });
  }

  private scalar(name: string, type: ScalarType): ScalarField {
    const f = this.entity.field(name);
    if (f === undefined) {
      throw new CompositionError(`Unknown field "${name}" on entity ${this.entity.name}`);
    }
    if (f.kind !== 'scalar') {
      throw new CompositionError(`${this.entity.name}.${name} is a relation; use relation("${name}")`);
    }
    if (f.type !== type) {
      throw new CompositionError(`${this.entity.name}.${name} is a ${f.type} field, not ${type}`);
    }
    return f;
  }
}

/** Binds an entity under an alias; the default alias is the lower-camel entity name. */
export function entity(schema: EntitySchema, alias?: string): EntityPath {
  return new EntityPath(schema, alias ?? schema.name.charAt(0).toLowerCase() + schema.name.slice(1));
}
