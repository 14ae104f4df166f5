// Public API barrel for the query tree model.

export {
  NONE_ITEM,
  word,
  phrase,
  regex,
  group,
  fieldGroup,
  searchField,
  proximity,
  fuzzy,
  boost,
  range,
  not,
  prohibit,
  plus,
  and,
  or,
  unknownOperation,
} from './nodes.js';
export { childrenOf, withChildren, attributesOf, nodesEqual } from './structure.js';
export { ancestryOf, isNodeType } from './hierarchy.js';
export type {
  QueryNode,
  NodeKind,
  NodeType,
  AbstractNodeType,
  NodeTypeMap,
  Word,
  Phrase,
  Regex,
  NoneItem,
  Group,
  FieldGroup,
  SearchField,
  Proximity,
  Fuzzy,
  Boost,
  Range,
  Not,
  Prohibit,
  Plus,
  AndOperation,
  OrOperation,
  UnknownOperation,
  Term,
  BaseGroup,
  BaseApprox,
  UnaryOperator,
  BaseOperation,
} from './types.js';
