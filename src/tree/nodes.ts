import type {
  AndOperation,
  Boost,
  FieldGroup,
  Fuzzy,
  Group,
  NoneItem,
  Not,
  OrOperation,
  Phrase,
  Plus,
  Prohibit,
  Proximity,
  QueryNode,
  Range,
  Regex,
  SearchField,
  UnknownOperation,
  Word,
} from './types.js';

// Node constructors. Every node is frozen on creation; rewriting always
// produces new values (see withChildren in structure.ts).

export const NONE_ITEM: NoneItem = Object.freeze({ kind: 'noneItem' });

export function word(value: string): Word {
  return Object.freeze({ kind: 'word', value });
}

export function phrase(value: string): Phrase {
  return Object.freeze({ kind: 'phrase', value });
}

export function regex(value: string): Regex {
  return Object.freeze({ kind: 'regex', value });
}

export function group(expr: QueryNode): Group {
  return Object.freeze({ kind: 'group', expr });
}

export function fieldGroup(expr: QueryNode): FieldGroup {
  return Object.freeze({ kind: 'fieldGroup', expr });
}

export function searchField(name: string, expr: QueryNode): SearchField {
  return Object.freeze({ kind: 'searchField', name, expr });
}

export function proximity(term: QueryNode, degree: number = 1): Proximity {
  return Object.freeze({ kind: 'proximity', term, degree });
}

export function fuzzy(term: QueryNode, degree: number = 0.5): Fuzzy {
  return Object.freeze({ kind: 'fuzzy', term, degree });
}

export function boost(expr: QueryNode, force: number): Boost {
  return Object.freeze({ kind: 'boost', expr, force });
}

/** `[low TO high]` by default; pass false to exclude a bound (`{low TO high}`). */
export function range(
  low: QueryNode,
  high: QueryNode,
  includeLow: boolean = true,
  includeHigh: boolean = true,
): Range {
  return Object.freeze({ kind: 'range', low, high, includeLow, includeHigh });
}

export function not(expr: QueryNode): Not {
  return Object.freeze({ kind: 'not', expr });
}

export function prohibit(expr: QueryNode): Prohibit {
  return Object.freeze({ kind: 'prohibit', expr });
}

export function plus(expr: QueryNode): Plus {
  return Object.freeze({ kind: 'plus', expr });
}

export function and(...operands: QueryNode[]): AndOperation {
  return Object.freeze({ kind: 'andOperation', operands: Object.freeze(operands) });
}

export function or(...operands: QueryNode[]): OrOperation {
  return Object.freeze({ kind: 'orOperation', operands: Object.freeze(operands) });
}

export function unknownOperation(...operands: QueryNode[]): UnknownOperation {
  return Object.freeze({ kind: 'unknownOperation', operands: Object.freeze(operands) });
}
