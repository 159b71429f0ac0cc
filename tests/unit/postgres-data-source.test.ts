import { describe, it, expect, vi } from 'vitest';
import type pg from 'pg';
import { entity } from '../../src/query/paths.js';
import { planColumns } from '../../src/query/plan.js';
import { query } from '../../src/query/query-object.js';
import { PostgresDataSource } from '../../src/store/postgres-data-source.js';
import { mapRow } from '../../src/store/row-mapper.js';
import { Member, Team } from './helpers.js';

const member = entity(Member);
const team = entity(Team);

// Helper to create a mock pool
function makeMockPool(rows: unknown[][]) {
  return {
    query: vi.fn().mockResolvedValue({ rows, rowCount: rows.length }),
    connect: vi.fn(),
    end: vi.fn().mockResolvedValue(undefined),
  };
}

describe('mapRow', () => {
  it('converts numeric strings in number-typed columns', () => {
    const q = query.select(team.string('name'), member.count(), member.number('age').avg()).from(member);
    const { columns } = planColumns(q.descriptor);
    expect(mapRow(['teamA', '2', '15.0000000000000000'], columns)).toEqual(['teamA', 2, 15]);
  });

  it('leaves strings in string-typed columns untouched', () => {
    const q = query.select(member.string('username'), member.number('age').stringValue()).from(member);
    const { columns } = planColumns(q.descriptor);
    expect(mapRow(['10', '10'], columns)).toEqual(['10', '10']);
  });

  it('maps missing cells to null', () => {
    const q = query.select(member.string('username'), member.number('age')).from(member);
    expect(mapRow([], planColumns(q.descriptor).columns)).toEqual([null, null]);
  });
});

describe('PostgresDataSource.execute()', () => {
  it('sends the compiled SQL in array row mode', async () => {
    const pool = makeMockPool([]);
    const source = new PostgresDataSource({ pool: pool as unknown as pg.Pool });
    const q = query.select(member.string('username')).from(member).where(member.number('age').gt(10));
    await source.execute({ descriptor: q.descriptor, columns: planColumns(q.descriptor).columns });
    expect(pool.query).toHaveBeenCalledWith({
      text: 'SELECT "member"."username"\nFROM "member" AS "member"\nWHERE "member"."age" > $1::numeric',
      values: [10],
      rowMode: 'array',
    });
  });

  it('returns positional rows with numeric coercion', async () => {
    const pool = makeMockPool([['member1', '10']]);
    const source = new PostgresDataSource({ pool: pool as unknown as pg.Pool });
    const q = query.select(member.string('username'), member.number('age').sum()).from(member).groupBy(member.string('username'));
    const rows = await source.execute({ descriptor: q.descriptor, columns: planColumns(q.descriptor).columns });
    expect(rows).toEqual([['member1', 10]]);
  });

  it('propagates pool errors unchanged', async () => {
    const failure = new Error('connection refused');
    const pool = makeMockPool([]);
    pool.query.mockRejectedValueOnce(failure);
    const source = new PostgresDataSource({ pool: pool as unknown as pg.Pool });
    const q = query.selectFrom(team);
    await expect(
      source.execute({ descriptor: q.descriptor, columns: planColumns(q.descriptor).columns }),
    ).rejects.toBe(failure);
  });
});

describe('PostgresDataSource.close()', () => {
  it('ends the pool by default', async () => {
    const pool = makeMockPool([]);
    await new PostgresDataSource({ pool: pool as unknown as pg.Pool }).close();
    expect(pool.end).toHaveBeenCalledOnce();
  });

  it('leaves the pool open when endPoolOnClose is false', async () => {
    const pool = makeMockPool([]);
    await new PostgresDataSource({ pool: pool as unknown as pg.Pool, endPoolOnClose: false }).close();
    expect(pool.end).not.toHaveBeenCalled();
  });
});
