import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the query DSL', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.query.select).toBe('function');
    expect(typeof api.query.selectFrom).toBe('function');
    expect(typeof api.entity).toBe('function');
    expect(typeof api.predicates).toBe('function');
    expect(typeof api.allOf).toBe('function');
    expect(typeof api.cases).toBe('function');
    expect(typeof api.constant).toBe('function');
    expect(api.entity(api.defineEntity({ name: 'Tag', fields: { id: api.field.number() } })).number('id')).toBeInstanceOf(
      api.AnyExpression,
    );
  });

  it('exports schema definition helpers', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.defineEntity).toBe('function');
    expect(typeof api.defineSchema).toBe('function');
    expect(typeof api.field.string).toBe('function');
    expect(typeof api.relation.manyToOne).toBe('function');
  });

  it('exports projections, executor and data sources', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.Projections.bean).toBe('function');
    expect(typeof api.QueryExecutor).toBe('function');
    expect(typeof api.PostgresDataSource).toBe('function');
    expect(typeof api.MemoryDataSource).toBe('function');
  });

  it('exports error classes', async () => {
    const api = await import('../../src/index.js');
    expect(new api.CompositionError('x')).toBeInstanceOf(Error);
    expect(new api.SchemaError('x')).toBeInstanceOf(Error);
    expect(new api.NonUniqueResultError(2)).toBeInstanceOf(Error);
  });
});
