import { SchemaError } from '../errors.js';

export type ScalarType = 'string' | 'number' | 'boolean' | 'date';

export interface ScalarField {
  readonly kind: 'scalar';
  readonly name: string;
  readonly type: ScalarType;
  readonly column: string;
  readonly nullable: boolean;
}

/** Owning side of a relation: the join column lives on the declaring table. */
export interface ManyToOneField {
  readonly kind: 'manyToOne';
  readonly name: string;
  readonly target: string;
  readonly joinColumn: string;
}

/**
 * Non-owning back reference. Resolved through the many-to-one field named
 * by `mappedBy` on the target entity.
 */
export interface OneToManyField {
  readonly kind: 'oneToMany';
  readonly name: string;
  readonly target: string;
  readonly mappedBy: string;
}

export type RelationField = ManyToOneField | OneToManyField;
export type FieldDescriptor = ScalarField | RelationField;

export interface FieldSpec {
  build(name: string): FieldDescriptor;
}

function toSnakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

export class ScalarFieldSpec implements FieldSpec {
  constructor(
    private readonly type: ScalarType,
    private readonly columnName: string | null = null,
    private readonly isNullable: boolean = false,
  ) {}

  /** Override the column name (defaults to the snake_cased field name). */
  column(name: string): ScalarFieldSpec {
    return new ScalarFieldSpec(this.type, name, this.isNullable);
  }

  nullable(): ScalarFieldSpec {
    return new ScalarFieldSpec(this.type, this.columnName, true);
  }

  build(name: string): ScalarField {
    return {
      kind: 'scalar',
      name,
      type: this.type,
      column: this.columnName ?? toSnakeCase(name),
      nullable: this.isNullable,
    };
  }
}

class ManyToOneSpec implements FieldSpec {
  constructor(
    private readonly target: string,
    private readonly joinColumn: string | null,
  ) {}

  build(name: string): ManyToOneField {
    return {
      kind: 'manyToOne',
      name,
      target: this.target,
      joinColumn: this.joinColumn ?? `${toSnakeCase(name)}_id`,
    };
  }
}

class OneToManySpec implements FieldSpec {
  constructor(
    private readonly target: string,
    private readonly mappedBy: string,
  ) {}

  build(name: string): OneToManyField {
    return { kind: 'oneToMany', name, target: this.target, mappedBy: this.mappedBy };
  }
}

export const field = {
  string: (): ScalarFieldSpec => new ScalarFieldSpec('string'),
  number: (): ScalarFieldSpec => new ScalarFieldSpec('number'),
  boolean: (): ScalarFieldSpec => new ScalarFieldSpec('boolean'),
  date: (): ScalarFieldSpec => new ScalarFieldSpec('date'),
};

export const relation = {
  manyToOne: (target: string, joinColumn?: string): FieldSpec =>
    new ManyToOneSpec(target, joinColumn ?? null),
  oneToMany: (target: string, mappedBy: string): FieldSpec =>
    new OneToManySpec(target, mappedBy),
};

export interface EntityDefinition {
  name: string;
  /** Defaults to the snake_cased entity name. */
  table?: string;
  /** Identity field name. Defaults to `id`. */
  id?: string;
  fields: Record<string, FieldSpec>;
}

const ENTITY_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Field metadata for one entity, consulted while queries are composed.
 * Use defineEntity() to create validated instances.
 */
export class EntitySchema {
  readonly idField: ScalarField;

  constructor(
    readonly name: string,
    readonly table: string,
    private readonly fieldMap: ReadonlyMap<string, FieldDescriptor>,
    idName: string,
  ) {
    const id = fieldMap.get(idName);
    if (id === undefined || id.kind !== 'scalar') {
      throw new SchemaError(`Entity "${name}": identity field "${idName}" must be a declared scalar field`);
    }
    this.idField = id;
  }

  get fields(): FieldDescriptor[] {
    return [...this.fieldMap.values()];
  }

  /** Scalar fields in declaration order. */
  get scalarFields(): ScalarField[] {
    return this.fields.filter((f): f is ScalarField => f.kind === 'scalar');
  }

  get manyToOneFields(): ManyToOneField[] {
    return this.fields.filter((f): f is ManyToOneField => f.kind === 'manyToOne');
  }

  get oneToManyFields(): OneToManyField[] {
    return this.fields.filter((f): f is OneToManyField => f.kind === 'oneToMany');
  }

  field(name: string): FieldDescriptor | undefined {
    return this.fieldMap.get(name);
  }
}

export function defineEntity(def: EntityDefinition): EntitySchema {
  if (!ENTITY_NAME_PATTERN.test(def.name)) {
    throw new SchemaError(`defineEntity: name "${def.name}" must match ${String(ENTITY_NAME_PATTERN)}`);
  }

  const fieldMap = new Map<string, FieldDescriptor>();
  const columns = new Set<string>();
  for (const [name, spec] of Object.entries(def.fields)) {
    const descriptor = spec.build(name);
    const column =
      descriptor.kind === 'scalar' ? descriptor.column
        : descriptor.kind === 'manyToOne' ? descriptor.joinColumn
          : null;
    if (column !== null) {
      if (columns.has(column)) {
        throw new SchemaError(`Entity "${def.name}": column "${column}" is mapped twice`);
      }
      columns.add(column);
    }
    fieldMap.set(name, descriptor);
  }

  return new EntitySchema(def.name, def.table ?? toSnakeCase(def.name), fieldMap, def.id ?? 'id');
}
