import { CompositionError } from '../errors.js';
import type { EntitySchema, ManyToOneField } from '../schema/entity.js';
import type { ExpressionNode, JoinSpec, QueryDescriptor } from './types.js';

export interface EntityHydration {
  readonly entity: EntitySchema;
  readonly alias: string;
  readonly idIndex: number;
  readonly scalars: readonly { readonly name: string; readonly index: number }[];
  readonly references: readonly {
    readonly field: ManyToOneField;
    readonly index: number;
    readonly fetched: EntityHydration | null;
  }[];
}

export type SlotPlan =
  | { readonly kind: 'value'; readonly index: number }
  | { readonly kind: 'entity'; readonly hydration: EntityHydration };

/**
 * Flattened output of a query: one expression per column position, and for
 * every select item the columns it is rebuilt from.
 */
export interface ColumnPlan {
  readonly columns: readonly ExpressionNode[];
  readonly slots: readonly SlotPlan[];
}

export interface JoinKeys {
  readonly ownerAlias: string;
  readonly ownerColumn: string;
  readonly targetColumn: string;
}

export function entityOf(descriptor: QueryDescriptor, alias: string): EntitySchema | undefined {
  return (
    descriptor.from.find((s) => s.alias === alias)?.entity ??
    descriptor.joins.find((j) => j.target.alias === alias)?.target.entity
  );
}

/**
 * Column pair a relation join matches on: `owner.ownerColumn = target.targetColumn`.
 * Null for theta joins.
 */
export function joinKeys(descriptor: QueryDescriptor, join: JoinSpec): JoinKeys | null {
  if (join.relation === null) return null;
  const { ownerAlias, field } = join.relation;
  if (field.kind === 'manyToOne') {
    return { ownerAlias, ownerColumn: field.joinColumn, targetColumn: join.target.entity.idField.column };
  }
  const owner = entityOf(descriptor, ownerAlias);
  const back = join.target.entity.field(field.mappedBy);
  if (owner === undefined || back === undefined || back.kind !== 'manyToOne') {
    throw new CompositionError(`Cannot resolve join ${ownerAlias}.${field.name} through "${field.mappedBy}"`);
  }
  return { ownerAlias, ownerColumn: owner.idField.column, targetColumn: back.joinColumn };
}

export function planColumns(descriptor: QueryDescriptor): ColumnPlan {
  const columns: ExpressionNode[] = [];
  const consumedFetches = new Set<JoinSpec>();

  const sourceOf = (alias: string): EntitySchema => {
    const found = entityOf(descriptor, alias);
    if (found === undefined) {
      throw new CompositionError(`Alias "${alias}" is selected but not declared by from() or a join`);
    }
    return found;
  };

  const planEntity = (alias: string, entity: EntitySchema): EntityHydration => {
    let idIndex = -1;
    const scalars = entity.scalarFields.map((f) => {
      const index = columns.length;
      columns.push({ kind: 'field', alias, entity: entity.name, field: f.name, column: f.column, type: f.type });
      if (f.name === entity.idField.name) idIndex = index;
      return { name: f.name, index };
    });

    const references = entity.manyToOneFields.map((field) => {
      const fetchJoin = descriptor.joins.find(
        (j) => j.fetch && j.relation !== null && j.relation.ownerAlias === alias && j.relation.field.name === field.name,
      );
      const index = columns.length;
      columns.push({
        kind: 'column',
        alias,
        column: field.joinColumn,
        type: fetchJoin === undefined ? 'unknown' : fetchJoin.target.entity.idField.type,
      });
      if (fetchJoin === undefined) {
        return { field, index, fetched: null };
      }
      consumedFetches.add(fetchJoin);
      return { field, index, fetched: planEntity(fetchJoin.target.alias, fetchJoin.target.entity) };
    });

    return { entity, alias, idIndex, scalars, references };
  };

  const slots = descriptor.select.map((item): SlotPlan => {
    if (item.kind === 'entity') {
      return { kind: 'entity', hydration: planEntity(item.alias, sourceOf(item.alias)) };
    }
    columns.push(item.expr);
    return { kind: 'value', index: columns.length - 1 };
  });

  for (const join of descriptor.joins) {
    if (join.fetch && !consumedFetches.has(join)) {
      throw new CompositionError(
        `Fetch join on "${join.target.alias}" requires its owner "${join.relation?.ownerAlias ?? '?'}" to be selected as an entity`,
      );
    }
  }

  return { columns, slots };
}
