import { CompositionError } from '../errors.js';
import type { ExpressionNode, PredicateNode, QueryDescriptor } from './types.js';

/**
 * Checks a descriptor before it reaches a data source: every alias it
 * references is declared by this query or an enclosing one, aliases are
 * unique across the nesting, theta joins carry ON, each ON names only
 * aliases declared before it, sub-queries used as values project exactly
 * one expression, and an entity selected alone cannot be nulled by an outer
 * join.
 */
export function validateQuery(descriptor: QueryDescriptor, outer: ReadonlySet<string> = new Set()): void {
  if (descriptor.from.length === 0) {
    throw new CompositionError('Query has no source entity; call from()');
  }

  const own = new Set<string>();
  for (const alias of [...descriptor.from.map((s) => s.alias), ...descriptor.joins.map((j) => j.target.alias)]) {
    if (own.has(alias) || outer.has(alias)) {
      throw new CompositionError(`Alias "${alias}" is declared more than once; give the sub-query its own alias`);
    }
    own.add(alias);
  }
  const scope = new Set([...outer, ...own]);

  const checkExpr = (node: ExpressionNode, visible: ReadonlySet<string>): void => {
    switch (node.kind) {
      case 'field':
      case 'column':
        if (!visible.has(node.alias)) {
          throw new CompositionError(`Alias "${node.alias}" is referenced but not declared by from() or a join`);
        }
        return;
      case 'constant':
        return;
      case 'aggregate':
        if (node.arg !== null) checkExpr(node.arg, visible);
        return;
      case 'concat':
        node.parts.forEach((part) => checkExpr(part, visible));
        return;
      case 'stringValue':
        checkExpr(node.arg, visible);
        return;
      case 'case':
        for (const b of node.branches) {
          checkPredicate(b.when, visible);
          checkExpr(b.then, visible);
        }
        checkExpr(node.otherwise, visible);
        return;
      case 'subquery':
        checkScalarSubquery(node.query, visible);
        return;
    }
  };

  const checkPredicate = (node: PredicateNode, visible: ReadonlySet<string>): void => {
    switch (node.kind) {
      case 'true':
        return;
      case 'compare':
        checkExpr(node.left, visible);
        checkExpr(node.right, visible);
        return;
      case 'between':
        [node.operand, node.low, node.high].forEach((e) => checkExpr(e, visible));
        return;
      case 'in':
        checkExpr(node.operand, visible);
        node.list.forEach((e) => checkExpr(e, visible));
        return;
      case 'inQuery':
        checkExpr(node.operand, visible);
        checkScalarSubquery(node.query, visible);
        return;
      case 'null':
      case 'like':
        checkExpr(node.operand, visible);
        return;
      case 'and':
      case 'or':
        node.predicates.forEach((p) => checkPredicate(p, visible));
        return;
      case 'not':
        checkPredicate(node.predicate, visible);
        return;
    }
  };

  const checkScalarSubquery = (sub: QueryDescriptor, visible: ReadonlySet<string>): void => {
    const item = sub.select[0];
    if (sub.select.length !== 1 || item === undefined || item.kind !== 'expression') {
      throw new CompositionError('A sub-query used as a value must project exactly one expression');
    }
    validateQuery(sub, visible);
  };

  for (const item of descriptor.select) {
    if (item.kind === 'entity') {
      if (!own.has(item.alias)) {
        throw new CompositionError(`Alias "${item.alias}" is selected but not declared by from() or a join`);
      }
    } else {
      checkExpr(item.expr, scope);
    }
  }

  // An ON condition sees the enclosing scope, the roots and the joins declared up to its own
  const joined = new Set([...outer, ...descriptor.from.map((s) => s.alias)]);
  const nullable = new Set<string>();
  for (const join of descriptor.joins) {
    if (join.relation === null && join.on === null) {
      throw new CompositionError(`Theta join on "${join.target.alias}" needs an on() condition`);
    }
    if (join.kind === 'right') {
      for (const alias of joined) {
        if (own.has(alias)) nullable.add(alias);
      }
    }
    joined.add(join.target.alias);
    if (join.kind === 'left') nullable.add(join.target.alias);
    if (join.on !== null) checkPredicate(join.on, joined);
  }

  const [only] = descriptor.select;
  if (descriptor.select.length === 1 && only?.kind === 'entity' && nullable.has(only.alias)) {
    throw new CompositionError(
      `Entity "${only.alias}" may be null under an outer join; select it with another item and read it from the tuple`,
    );
  }

  if (descriptor.where !== null) checkPredicate(descriptor.where, scope);
  descriptor.groupBy.forEach((e) => checkExpr(e, scope));
  if (descriptor.having !== null) checkPredicate(descriptor.having, scope);
  for (const order of descriptor.orderBy) checkExpr(order.expr, scope);
}
