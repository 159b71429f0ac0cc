import { describe, it, expect } from 'vitest';
import { SchemaError } from '../../src/errors.js';
import { defineEntity, field, relation } from '../../src/schema/entity.js';
import { defineSchema } from '../../src/schema/schema.js';
import { Member, Team, schema } from './helpers.js';

describe('defineEntity', () => {

  // ---------------------------------------------------------------------------
  // Defaults
  // ---------------------------------------------------------------------------
  describe('defaults', () => {
    it('snake_cases the table name from the entity name', () => {
      const e = defineEntity({ name: 'TeamMember', fields: { id: field.number() } });
      expect(e.table).toBe('team_member');
    });

    it('snake_cases column names from field names', () => {
      const e = defineEntity({ name: 'Account', fields: { id: field.number(), createdAt: field.date() } });
      expect(e.field('createdAt')).toEqual({
        kind: 'scalar',
        name: 'createdAt',
        type: 'date',
        column: 'created_at',
        nullable: false,
      });
    });

    it('derives the many-to-one join column from the field name', () => {
      expect(Member.field('team')).toEqual({ kind: 'manyToOne', name: 'team', target: 'Team', joinColumn: 'team_id' });
    });

    it('uses "id" as the identity field', () => {
      expect(Member.idField.name).toBe('id');
    });
  });

  // ---------------------------------------------------------------------------
  // Overrides
  // ---------------------------------------------------------------------------
  describe('overrides', () => {
    it('honours table, id, column and nullable overrides', () => {
      const e = defineEntity({
        name: 'Account',
        table: 'accounts',
        id: 'accountNo',
        fields: {
          accountNo: field.string().column('acct_no'),
          label: field.string().nullable(),
          owner: relation.manyToOne('Member', 'owner_member_id'),
        },
      });
      expect(e.table).toBe('accounts');
      expect(e.idField.column).toBe('acct_no');
      expect(e.field('label')).toMatchObject({ nullable: true });
      expect(e.field('owner')).toMatchObject({ joinColumn: 'owner_member_id' });
    });
  });

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------
  describe('introspection', () => {
    it('lists scalar fields in declaration order', () => {
      expect(Member.scalarFields.map((f) => f.name)).toEqual(['id', 'username', 'age']);
    });

    it('separates many-to-one and one-to-many relations', () => {
      expect(Member.manyToOneFields.map((f) => f.name)).toEqual(['team']);
      expect(Team.oneToManyFields.map((f) => f.name)).toEqual(['members']);
    });

    it('returns undefined for an unknown field', () => {
      expect(Member.field('nope')).toBeUndefined();
    });
  });

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------
  describe('validation', () => {
    it('rejects an invalid entity name', () => {
      expect(() => defineEntity({ name: '1Bad', fields: { id: field.number() } })).toThrow(SchemaError);
    });

    it('rejects a missing identity field', () => {
      expect(() => defineEntity({ name: 'Thing', fields: { name: field.string() } })).toThrow(SchemaError);
    });

    it('rejects a relation as identity', () => {
      expect(() =>
        defineEntity({ name: 'Thing', id: 'team', fields: { team: relation.manyToOne('Team') } }),
      ).toThrow(SchemaError);
    });

    it('rejects two fields mapped to the same column', () => {
      expect(() =>
        defineEntity({
          name: 'Thing',
          fields: { id: field.number(), a: field.string().column('x'), b: field.string().column('x') },
        }),
      ).toThrow('column "x" is mapped twice');
    });
  });
});

describe('defineSchema', () => {
  it('looks entities up by name', () => {
    expect(schema.entity('Member')).toBe(Member);
  });

  it('throws SchemaError for an unknown entity', () => {
    expect(() => schema.entity('Nope')).toThrow(SchemaError);
  });

  it('rejects duplicate entity names', () => {
    expect(() => defineSchema([Team, Team])).toThrow('entity "Team" is declared twice');
  });

  it('rejects a relation to an undeclared entity', () => {
    expect(() => defineSchema([Member])).toThrow('Member.team: unknown target entity "Team"');
  });

  it('rejects a mappedBy that is not a many-to-one back to the owner', () => {
    const BadTeam = defineEntity({
      name: 'Team',
      fields: { id: field.number(), members: relation.oneToMany('Member', 'age') },
    });
    expect(() => defineSchema([BadTeam, Member])).toThrow(SchemaError);
  });
});
