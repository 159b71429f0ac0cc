export { defineEntity, field, relation, EntitySchema } from './schema/entity.js';
export type {
  ScalarType,
  ScalarField,
  ManyToOneField,
  OneToManyField,
  RelationField,
  FieldDescriptor,
  EntityDefinition,
} from './schema/entity.js';
export { defineSchema } from './schema/schema.js';
export type { Schema } from './schema/schema.js';

export { query } from './query/query-object.js';
export { Query } from './query/builder.js';
export { entity, EntityPath, FieldPath, RelationPath } from './query/paths.js';
export { AnyExpression, Expression, OrderSpecifier, constant, as, cases } from './query/expressions.js';
export type { Operand } from './query/expressions.js';
export { Predicate } from './query/predicate.js';
export { predicates, allOf, PredicateBuilder } from './query/predicate-builder.js';
export { compileSelect } from './query/compiler.js';
export type { CompiledQuery } from './query/compiler.js';
export type {
  QueryDescriptor,
  ExpressionNode,
  PredicateNode,
  JoinSpec,
  OrderSpec,
  NullPlacement,
  SelectItem,
} from './query/types.js';

export { Projections, Projection } from './projection/projections.js';
export type { Binder, BindingStrategy, Selectable } from './projection/projections.js';
export { Tuple } from './projection/tuple.js';
export { LazyReference, LazyCollection, isLoaded, isEntityRecord, entityNameOf } from './projection/entity-record.js';
export type { EntityRecord } from './projection/entity-record.js';

export { QueryExecutor } from './executor/executor.js';
export type { QueryExecutorConfig } from './executor/executor.js';
export { PostgresDataSource } from './store/postgres-data-source.js';
export type { PostgresDataSourceConfig } from './store/postgres-data-source.js';
export { MemoryDataSource, QueryEvaluationError } from './store/memory-data-source.js';
export type { MemoryDataSourceConfig } from './store/memory-data-source.js';
export type { DataSource, ExecutionRequest, ResultRow, QueryEvent } from './types.js';

export { CompositionError, SchemaError, NonUniqueResultError } from './errors.js';
