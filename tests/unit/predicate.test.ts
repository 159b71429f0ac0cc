import { describe, it, expect } from 'vitest';
import { CompositionError } from '../../src/errors.js';
import { constant, cases, escapeLike } from '../../src/query/expressions.js';
import { entity } from '../../src/query/paths.js';
import { Predicate } from '../../src/query/predicate.js';
import { allOf, predicates } from '../../src/query/predicate-builder.js';
import { Member } from './helpers.js';

const member = entity(Member);
const username = member.string('username');
const age = member.number('age');

describe('Predicate', () => {

  // ---------------------------------------------------------------------------
  // TRUE identity
  // ---------------------------------------------------------------------------
  describe('TRUE', () => {
    it('is the identity of and()', () => {
      const p = age.eq(10);
      expect(Predicate.TRUE.and(p)).toBe(p);
      expect(p.and(Predicate.TRUE)).toBe(p);
    });

    it('absorbs or()', () => {
      expect(age.eq(10).or(Predicate.TRUE).isTrue).toBe(true);
    });
  });

  // ---------------------------------------------------------------------------
  // Combinators
  // ---------------------------------------------------------------------------
  describe('combinators', () => {
    it('flattens nested and()', () => {
      const p = age.eq(10).and(age.eq(20)).and(age.eq(30));
      expect(p.node.kind).toBe('and');
      expect(p.node.kind === 'and' ? p.node.predicates : []).toHaveLength(3);
    });

    it('does not mutate its operands', () => {
      const a = age.eq(10);
      const before = a.node;
      a.and(age.eq(20));
      expect(a.node).toBe(before);
    });

    it('unwraps double negation', () => {
      const p = username.eq('member1');
      expect(p.not().not().node).toEqual(p.node);
    });
  });
});

describe('leaf operators', () => {
  it('eq binds a field to a constant', () => {
    expect(username.eq('member1').node).toEqual({
      kind: 'compare',
      op: 'eq',
      left: { kind: 'field', alias: 'member', entity: 'Member', field: 'username', column: 'username', type: 'string' },
      right: { kind: 'constant', value: 'member1' },
    });
  });

  it('between keeps both bounds', () => {
    const node = age.between(10, 30).node;
    expect(node.kind === 'between' ? [node.low, node.high] : []).toEqual([
      { kind: 'constant', value: 10 },
      { kind: 'constant', value: 30 },
    ]);
  });

  it('contains escapes wildcards', () => {
    expect(username.contains('50%_off').node).toMatchObject({ kind: 'like', pattern: '%50\\%\\_off%' });
  });

  it('startsWith and endsWith anchor the pattern', () => {
    expect(username.startsWith('mem').node).toMatchObject({ pattern: 'mem%' });
    expect(username.endsWith('1').node).toMatchObject({ pattern: '%1' });
  });

  it('like passes the pattern through unchanged', () => {
    expect(username.like('member_%').node).toMatchObject({ pattern: 'member_%' });
  });

  it('escapeLike escapes the escape character', () => {
    expect(escapeLike('a\\b')).toBe('a\\\\b');
  });

  it('in and notIn keep the value list', () => {
    expect(age.in([10, 20]).node).toMatchObject({ kind: 'in', negated: false });
    expect(age.notIn([10]).node).toMatchObject({ kind: 'in', negated: true });
  });

  it('isNull and isNotNull', () => {
    expect(username.isNull().node).toMatchObject({ kind: 'null', negated: false });
    expect(username.isNotNull().node).toMatchObject({ kind: 'null', negated: true });
  });
});

describe('composition-time type checks', () => {
  it('rejects LIKE operators on a number field', () => {
    expect(() => age.contains('1')).toThrow(CompositionError);
  });

  it('rejects ordered comparison on a boolean expression', () => {
    expect(() => constant(true).gt(false)).toThrow('Operator "gt" cannot be applied');
  });

  it('rejects sum on a string field', () => {
    expect(() => username.sum()).toThrow(CompositionError);
  });

  it('rejects a null literal in eq', () => {
    const nullable = constant(null);
    expect(() => age.eq(nullable)).toThrow('use isNull() or isNotNull()');
  });

  it('rejects a field read as the wrong type', () => {
    expect(() => member.number('username')).toThrow('Member.username is a string field, not number');
  });

  it('rejects an unknown field', () => {
    expect(() => member.string('nickname')).toThrow('Unknown field "nickname" on entity Member');
  });

  it('accepts an expression operand of the same type', () => {
    const p = username.eq(age.stringValue().concat('x'));
    expect(p.node.kind === 'compare' ? p.node.right.kind : null).toBe('concat');
  });

  it('rejects in() over an expression that is not a sub-query', () => {
    expect(() => username.in(username.concat('x'))).toThrow('takes a list of values or a sub-query');
  });
});

describe('case expressions', () => {
  it('builds a searched case with an otherwise branch', () => {
    const expr = cases().when(age.between(0, 20)).then('0~20').otherwise('other');
    expect(expr.node).toEqual({
      kind: 'case',
      branches: [{ when: age.between(0, 20).node, then: { kind: 'constant', value: '0~20' } }],
      otherwise: { kind: 'constant', value: 'other' },
    });
  });

  it('builds a simple case as equality branches', () => {
    const expr = age.when(10).then('ten').when(20).then('twenty').otherwise('other');
    expect(expr.node.kind === 'case' ? expr.node.branches.map((b) => b.when) : []).toEqual([
      age.eq(10).node,
      age.eq(20).node,
    ]);
  });
});

describe('allOf', () => {
  it('is TRUE when nothing is supplied', () => {
    expect(allOf().isTrue).toBe(true);
    expect(allOf(null, undefined).isTrue).toBe(true);
  });

  it('skips absent entries', () => {
    const p = age.goe(10);
    expect(allOf(null, p, undefined)).toBe(p);
  });
});

describe('PredicateBuilder', () => {
  it('builds TRUE when empty', () => {
    const b = predicates();
    expect(b.hasValue).toBe(false);
    expect(b.build().isTrue).toBe(true);
  });

  it('ANDs contributions in order', () => {
    const p = predicates().and(age.goe(10)).and(age.loe(30)).build();
    expect(p.node).toEqual(age.goe(10).and(age.loe(30)).node);
  });

  it('is immutable', () => {
    const base = predicates().and(age.goe(10));
    const refined = base.and(age.loe(30));
    expect(base.build().node).toEqual(age.goe(10).node);
    expect(refined.build().node.kind).toBe('and');
  });

  it('ifPresent skips null and undefined but keeps 0', () => {
    const p = predicates()
      .ifPresent<number>(null, (v) => age.eq(v))
      .ifPresent<number>(undefined, (v) => age.eq(v))
      .ifPresent(0, (v) => age.eq(v))
      .build();
    expect(p.node).toEqual(age.eq(0).node);
  });

  it('ifText skips blank strings', () => {
    const p = predicates()
      .ifText('', (v) => username.eq(v))
      .ifText('   ', (v) => username.eq(v))
      .build();
    expect(p.isTrue).toBe(true);
  });

  it('when does not evaluate a thunk whose condition is false', () => {
    let called = false;
    predicates().when(false, () => {
      called = true;
      return age.eq(1);
    });
    expect(called).toBe(false);
  });

  it('or combines with the accumulated predicate', () => {
    const p = predicates().and(age.eq(10)).or(age.eq(20)).build();
    expect(p.node).toEqual(age.eq(10).or(age.eq(20)).node);
  });
});
