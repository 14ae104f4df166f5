import { NodeArityError } from '../errors.js';
import type { QueryNode } from './types.js';

/**
 * Ordered children of a node. Each kind names its child attribute(s)
 * explicitly; other properties a node may carry are never consulted.
 */
export function childrenOf(node: QueryNode): readonly QueryNode[] {
  switch (node.kind) {
    case 'word':
    case 'phrase':
    case 'regex':
    case 'noneItem':
      return [];
    case 'group':
    case 'fieldGroup':
    case 'searchField':
    case 'boost':
    case 'not':
    case 'prohibit':
    case 'plus':
      return [node.expr];
    case 'proximity':
    case 'fuzzy':
      return [node.term];
    case 'range':
      return [node.low, node.high];
    case 'andOperation':
    case 'orOperation':
    case 'unknownOperation':
      return node.operands;
  }
}

function exactlyOne(node: QueryNode, children: readonly QueryNode[]): QueryNode {
  const [only] = children;
  if (only === undefined || children.length !== 1) {
    throw new NodeArityError(node.kind, 1, children.length);
  }
  return only;
}

/**
 * Returns a copy of `node` with its children replaced. Every other
 * property of `node` is carried over as-is, including ones the node
 * model does not declare.
 *
 * @throws NodeArityError when a fixed-arity kind gets the wrong number of children
 */
export function withChildren(node: QueryNode, children: readonly QueryNode[]): QueryNode {
  switch (node.kind) {
    case 'word':
    case 'phrase':
    case 'regex':
    case 'noneItem':
      if (children.length !== 0) {
        throw new NodeArityError(node.kind, 0, children.length);
      }
      return node;
    case 'group':
    case 'fieldGroup':
    case 'searchField':
    case 'boost':
    case 'not':
    case 'prohibit':
    case 'plus':
      return Object.freeze({ ...node, expr: exactlyOne(node, children) });
    case 'proximity':
    case 'fuzzy':
      return Object.freeze({ ...node, term: exactlyOne(node, children) });
    case 'range': {
      const [low, high] = children;
      if (low === undefined || high === undefined || children.length !== 2) {
        throw new NodeArityError(node.kind, 2, children.length);
      }
      return Object.freeze({ ...node, low, high });
    }
    case 'andOperation':
    case 'orOperation':
    case 'unknownOperation':
      return Object.freeze({ ...node, operands: Object.freeze([...children]) });
  }
}

/** Declared non-child attribute values, in declaration order. */
export function attributesOf(node: QueryNode): readonly unknown[] {
  switch (node.kind) {
    case 'word':
    case 'phrase':
    case 'regex':
      return [node.value];
    case 'searchField':
      return [node.name];
    case 'proximity':
    case 'fuzzy':
      return [node.degree];
    case 'boost':
      return [node.force];
    case 'range':
      return [node.includeLow, node.includeHigh];
    default:
      return [];
  }
}

/**
 * Structural equality: same kind, same declared attributes, equal
 * children in the same order.
 */
export function nodesEqual(a: QueryNode, b: QueryNode): boolean {
  if (a === b) return true;
  if (a.kind !== b.kind) return false;

  const attrsB = attributesOf(b);
  if (!attributesOf(a).every((value, i) => Object.is(value, attrsB[i]))) {
    return false;
  }

  const childrenA = childrenOf(a);
  const childrenB = childrenOf(b);
  if (childrenA.length !== childrenB.length) return false;
  return childrenA.every((child, i) => {
    const other = childrenB[i];
    return other !== undefined && nodesEqual(child, other);
  });
}
