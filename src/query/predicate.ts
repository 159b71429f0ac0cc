import type { PredicateNode } from './types.js';

const TRUE_NODE: PredicateNode = { kind: 'true' };

function flatten(kind: 'and' | 'or', left: PredicateNode, right: PredicateNode): PredicateNode {
  const parts: PredicateNode[] = [];
  for (const node of [left, right]) {
    if (node.kind === kind) {
      // Flat accumulation: splice children of a same-kind node
      parts.push(...node.predicates);
    } else {
      parts.push(node);
    }
  }
  return { kind, predicates: parts };
}

/**
 * Immutable boolean expression over entity fields. Every combinator returns
 * a new Predicate; existing instances are never mutated.
 */
export class Predicate {
  /** The "no restriction" predicate. AND-ing with it is the identity. */
  static readonly TRUE = new Predicate(TRUE_NODE);

  constructor(readonly node: PredicateNode) {}

  get isTrue(): boolean {
    return this.node.kind === 'true';
  }

  and(other: Predicate): Predicate {
    if (this.isTrue) return other;
    if (other.isTrue) return this;
    return new Predicate(flatten('and', this.node, other.node));
  }

  or(other: Predicate): Predicate {
    if (this.isTrue || other.isTrue) return Predicate.TRUE;
    return new Predicate(flatten('or', this.node, other.node));
  }

  not(): Predicate {
    if (this.node.kind === 'not') return new Predicate(this.node.predicate);
    return new Predicate({ kind: 'not', predicate: this.node });
  }
}
