export interface Word {
  readonly kind: 'word';
  readonly value: string;
}

/** A quoted phrase. `value` holds the text between the quotes. */
export interface Phrase {
  readonly kind: 'phrase';
  readonly value: string;
}

/** A regular expression term. `value` holds the pattern between the slashes. */
export interface Regex {
  readonly kind: 'regex';
  readonly value: string;
}

/**
 * Placeholder for an operand position that carries no value.
 * There is exactly one instance: NONE_ITEM.
 */
export interface NoneItem {
  readonly kind: 'noneItem';
}

export interface Group {
  readonly kind: 'group';
  readonly expr: QueryNode;
}

/** Parenthesised expression directly under a search field, e.g. `title:(foo bar)`. */
export interface FieldGroup {
  readonly kind: 'fieldGroup';
  readonly expr: QueryNode;
}

export interface SearchField {
  readonly kind: 'searchField';
  readonly name: string;
  readonly expr: QueryNode;
}

/** `"foo bar"~2`: words of the phrase within `degree` positions of each other. */
export interface Proximity {
  readonly kind: 'proximity';
  readonly term: QueryNode;
  readonly degree: number;
}

/** `foo~0.8`: approximate word match with the given similarity. */
export interface Fuzzy {
  readonly kind: 'fuzzy';
  readonly term: QueryNode;
  readonly degree: number;
}

export interface Boost {
  readonly kind: 'boost';
  readonly expr: QueryNode;
  readonly force: number;
}

export interface Range {
  readonly kind: 'range';
  readonly low: QueryNode;
  readonly high: QueryNode;
  readonly includeLow: boolean;
  readonly includeHigh: boolean;
}

export interface Not {
  readonly kind: 'not';
  readonly expr: QueryNode;
}

/** `-foo` */
export interface Prohibit {
  readonly kind: 'prohibit';
  readonly expr: QueryNode;
}

/** `+foo` */
export interface Plus {
  readonly kind: 'plus';
  readonly expr: QueryNode;
}

export interface AndOperation {
  readonly kind: 'andOperation';
  readonly operands: readonly QueryNode[];
}

export interface OrOperation {
  readonly kind: 'orOperation';
  readonly operands: readonly QueryNode[];
}

/** Operands separated by whitespace only; the operator is left to the search backend. */
export interface UnknownOperation {
  readonly kind: 'unknownOperation';
  readonly operands: readonly QueryNode[];
}

export type QueryNode =
  | Word
  | Phrase
  | Regex
  | NoneItem
  | Group
  | FieldGroup
  | SearchField
  | Proximity
  | Fuzzy
  | Boost
  | Range
  | Not
  | Prohibit
  | Plus
  | AndOperation
  | OrOperation
  | UnknownOperation;

export type NodeKind = QueryNode['kind'];

export type Term = Word | Phrase | Regex;
export type BaseGroup = Group | FieldGroup;
export type BaseApprox = Proximity | Fuzzy;
export type UnaryOperator = Not | Prohibit | Plus;
export type BaseOperation = AndOperation | OrOperation | UnknownOperation;

/**
 * Every name a handler can be registered under: the concrete kinds plus
 * the abstract types that group them.
 */
export interface NodeTypeMap {
  word: Word;
  phrase: Phrase;
  regex: Regex;
  noneItem: NoneItem;
  group: Group;
  fieldGroup: FieldGroup;
  searchField: SearchField;
  proximity: Proximity;
  fuzzy: Fuzzy;
  boost: Boost;
  range: Range;
  not: Not;
  prohibit: Prohibit;
  plus: Plus;
  andOperation: AndOperation;
  orOperation: OrOperation;
  unknownOperation: UnknownOperation;
  term: Term;
  baseGroup: BaseGroup;
  baseApprox: BaseApprox;
  unaryOperator: UnaryOperator;
  baseOperation: BaseOperation;
}

export type NodeType = keyof NodeTypeMap;
export type AbstractNodeType = Exclude<NodeType, NodeKind>;
