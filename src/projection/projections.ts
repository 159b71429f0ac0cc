import { CompositionError } from '../errors.js';
import type { AnyExpression } from '../query/expressions.js';
import { EntityPath } from '../query/paths.js';
import type { SelectItem } from '../query/types.js';
import { Tuple, itemKey } from './tuple.js';

export type Selectable = AnyExpression | EntityPath;

export function selectItem(selectable: Selectable): SelectItem {
  if (selectable instanceof EntityPath) {
    return { kind: 'entity', alias: selectable.alias };
  }
  return { kind: 'expression', expr: selectable.node, name: selectable.alias };
}

/**
 * Output shape of a query: the items it selects and how one row of item
 * values becomes a result value.
 */
export abstract class Projection<R> {
  constructor(readonly items: readonly SelectItem[]) {}

  abstract create(values: readonly unknown[]): R;
}

export class ScalarProjection<T> extends Projection<T> {
  constructor(item: SelectItem) {
    super([item]);
  }

  create(values: readonly unknown[]): T {
    // Values arrive from the data source already typed by the expression that produced them
    return values[0] as T;
  }
}

export class TupleProjection extends Projection<Tuple> {
  private readonly keys: readonly string[];

  constructor(items: readonly SelectItem[]) {
    super(items);
    this.keys = items.map(itemKey);
  }

  create(values: readonly unknown[]): Tuple {
    return new Tuple(this.keys, values);
  }
}

/** Produces one structured record from the projected values of a row. */
export interface Binder<T> {
  bind(values: readonly unknown[]): T;
}

export type BindingStrategy = 'bean' | 'fields' | 'constructor';

export type NoArgConstructor<T> = new () => T;
export type AnyConstructor<T> = new (...args: never[]) => T;

function bindingName(item: SelectItem, strategy: BindingStrategy): string {
  if (item.kind === 'entity') {
    throw new CompositionError(`"${strategy}" binding cannot bind entity "${item.alias}" by name`);
  }
  if (item.name !== null) return item.name;
  if (item.expr.kind === 'field') return item.expr.field;
  throw new CompositionError(`"${strategy}" binding needs an alias for computed ${item.expr.kind} expressions`);
}

function findDescriptor(target: object, name: string): PropertyDescriptor | undefined {
  for (let obj: object | null = target; obj !== null; obj = Object.getPrototypeOf(obj)) {
    const descriptor = Object.getOwnPropertyDescriptor(obj, name);
    if (descriptor !== undefined) return descriptor;
  }
  return undefined;
}

/** Assigns through properties and setters of a default-constructed instance. */
export class BeanBinder<T extends object> implements Binder<T> {
  constructor(
    private readonly target: NoArgConstructor<T>,
    private readonly names: readonly string[],
  ) {
    const probe = new target();
    for (const name of names) {
      const descriptor = findDescriptor(probe, name);
      const writable = descriptor !== undefined && (descriptor.set !== undefined || descriptor.writable === true);
      if (!writable) {
        throw new CompositionError(`${target.name} has no writable property "${name}"`);
      }
    }
  }

  bind(values: readonly unknown[]): T {
    const instance = new this.target();
    this.names.forEach((name, i) => {
      Reflect.set(instance, name, values[i] ?? null);
    });
    return instance;
  }
}

/** Defines own fields directly on a default-constructed instance, bypassing setters. */
export class FieldBinder<T extends object> implements Binder<T> {
  constructor(
    private readonly target: NoArgConstructor<T>,
    private readonly names: readonly string[],
  ) {
    const probe = new target();
    for (const name of names) {
      const descriptor = Object.getOwnPropertyDescriptor(probe, name);
      if (descriptor === undefined || !('value' in descriptor) || descriptor.configurable !== true) {
        throw new CompositionError(`${target.name} declares no field "${name}"`);
      }
    }
  }

  bind(values: readonly unknown[]): T {
    const instance = new this.target();
    this.names.forEach((name, i) => {
      Object.defineProperty(instance, name, {
        value: values[i] ?? null,
        writable: true,
        enumerable: true,
        configurable: true,
      });
    });
    return instance;
  }
}

/**
 * One positional constructor call. The constructor's declared arity must
 * equal the number of projected expressions; default-valued parameters do
 * not count towards it.
 */
export class ConstructorBinder<T extends object> implements Binder<T> {
  constructor(
    private readonly target: AnyConstructor<T>,
    arity: number,
  ) {
    if (target.length !== arity) {
      throw new CompositionError(
        `${target.name} has no constructor taking ${arity} argument(s) (declares ${target.length})`,
      );
    }
  }

  bind(values: readonly unknown[]): T {
    const instance: T = Reflect.construct(this.target, [...values]);
    return instance;
  }
}

export class RecordProjection<T extends object> extends Projection<T> {
  constructor(
    items: readonly SelectItem[],
    private readonly binder: Binder<T>,
  ) {
    super(items);
  }

  create(values: readonly unknown[]): T {
    return this.binder.bind(values);
  }
}

function record<T extends object>(
  strategy: BindingStrategy,
  target: AnyConstructor<T>,
  selectables: readonly Selectable[],
  makeBinder: (names: readonly string[]) => Binder<T>,
): RecordProjection<T> {
  if (selectables.length === 0) {
    throw new CompositionError(`${target.name}: a "${strategy}" projection needs at least one expression`);
  }
  const items = selectables.map(selectItem);
  const names = strategy === 'constructor' ? [] : items.map((item) => bindingName(item, strategy));
  return new RecordProjection(items, makeBinder(names));
}

/**
 * Structured-record projections. All three strategies yield equal records
 * for the same expressions and values.
 *
 * @example
 * query.select(Projections.constructor(MemberDto, member.string('username'), member.number('age')))
 */
export const Projections = {
  bean<T extends object>(target: NoArgConstructor<T>, ...selectables: Selectable[]): RecordProjection<T> {
    return record('bean', target, selectables, (names) => new BeanBinder(target, names));
  },

  fields<T extends object>(target: NoArgConstructor<T>, ...selectables: Selectable[]): RecordProjection<T> {
    return record('fields', target, selectables, (names) => new FieldBinder(target, names));
  },

  constructor<T extends object>(target: AnyConstructor<T>, ...selectables: Selectable[]): RecordProjection<T> {
    return record('constructor', target, selectables, () => new ConstructorBinder(target, selectables.length));
  },
};
