import type { NodeKind, NodeType, NodeTypeMap, QueryNode } from './types.js';

/**
 * Declared type ancestry of every concrete kind: the kind itself first,
 * then its abstract ancestors from most to least specific.
 * Handler resolution walks these chains and nothing else.
 */
const ANCESTRY: Readonly<Record<NodeKind, readonly NodeType[]>> = {
  word: ['word', 'term'],
  phrase: ['phrase', 'term'],
  regex: ['regex', 'term'],
  noneItem: ['noneItem'],
  group: ['group', 'baseGroup'],
  fieldGroup: ['fieldGroup', 'baseGroup'],
  searchField: ['searchField'],
  proximity: ['proximity', 'baseApprox'],
  fuzzy: ['fuzzy', 'baseApprox'],
  boost: ['boost'],
  range: ['range'],
  not: ['not', 'unaryOperator'],
  prohibit: ['prohibit', 'unaryOperator'],
  plus: ['plus', 'unaryOperator'],
  andOperation: ['andOperation', 'baseOperation'],
  orOperation: ['orOperation', 'baseOperation'],
  unknownOperation: ['unknownOperation', 'baseOperation'],
};

export function ancestryOf(kind: NodeKind): readonly NodeType[] {
  return ANCESTRY[kind];
}

/** True when `node` is of the given kind or descends from the given abstract type. */
export function isNodeType<T extends NodeType>(node: QueryNode, type: T): node is NodeTypeMap[T] {
  return ANCESTRY[node.kind].includes(type);
}
