import { describe, it, expect } from 'vitest';
import {
  NONE_ITEM,
  and,
  boost,
  fieldGroup,
  fuzzy,
  group,
  not,
  or,
  phrase,
  plus,
  prohibit,
  proximity,
  range,
  regex,
  searchField,
  unknownOperation,
  word,
} from '../../src/tree/nodes.js';
import { attributesOf, childrenOf, nodesEqual, withChildren } from '../../src/tree/structure.js';
import { NodeArityError } from '../../src/errors.js';

describe('node constructors', () => {
  it('freezes every node', () => {
    expect(Object.isFrozen(word('a'))).toBe(true);
    expect(Object.isFrozen(and(word('a')))).toBe(true);
    expect(Object.isFrozen(and(word('a')).operands)).toBe(true);
    expect(Object.isFrozen(NONE_ITEM)).toBe(true);
  });

  it('applies default degrees', () => {
    expect(proximity(phrase('a b')).degree).toBe(1);
    expect(fuzzy(word('a')).degree).toBe(0.5);
  });

  it('includes both range bounds by default', () => {
    const r = range(word('1'), word('5'));
    expect(r.includeLow).toBe(true);
    expect(r.includeHigh).toBe(true);
  });

  it('keeps phrase and word apart', () => {
    expect(phrase('foo')).not.toEqual(word('foo'));
    expect(nodesEqual(phrase('foo'), word('foo'))).toBe(false);
  });
});

describe('childrenOf', () => {
  it('returns no children for leaves', () => {
    expect(childrenOf(word('a'))).toEqual([]);
    expect(childrenOf(phrase('a b'))).toEqual([]);
    expect(childrenOf(regex('a.*'))).toEqual([]);
    expect(childrenOf(NONE_ITEM)).toEqual([]);
  });

  it('returns the wrapped expression of single-child nodes', () => {
    const inner = word('x');
    for (const node of [
      group(inner),
      fieldGroup(inner),
      searchField('f', inner),
      boost(inner, 2),
      not(inner),
      prohibit(inner),
      plus(inner),
      proximity(inner, 2),
      fuzzy(inner),
    ]) {
      expect(childrenOf(node)).toEqual([inner]);
    }
  });

  it('returns both bounds of a range, low first', () => {
    expect(childrenOf(range(word('a'), word('z')))).toEqual([word('a'), word('z')]);
  });

  it('returns operands in order', () => {
    const operands = [word('a'), NONE_ITEM, phrase('b')];
    expect(childrenOf(and(...operands))).toEqual(operands);
    expect(childrenOf(or(...operands))).toEqual(operands);
    expect(childrenOf(unknownOperation(...operands))).toEqual(operands);
  });

  it('returns an empty list for an operation without operands', () => {
    expect(childrenOf(and())).toEqual([]);
  });

  it('ignores array-valued properties that are not children', () => {
    const decoyed = { extra: [word('no')], ...or(word('yes')), more: [] };
    expect(childrenOf(decoyed)).toEqual([word('yes')]);
  });
});

describe('withChildren', () => {
  it('replaces operands and keeps the kind', () => {
    const rebuilt = withChildren(and(word('a')), [word('b'), word('c')]);
    expect(rebuilt).toEqual(and(word('b'), word('c')));
  });

  it('accepts an empty operand list', () => {
    expect(withChildren(or(word('a')), [])).toEqual(or());
  });

  it('keeps non-child attributes', () => {
    expect(withChildren(searchField('title', word('a')), [word('b')])).toEqual(searchField('title', word('b')));
    expect(withChildren(proximity(phrase('a'), 4), [phrase('b')])).toEqual(proximity(phrase('b'), 4));
    expect(withChildren(boost(word('a'), 1.5), [word('b')])).toEqual(boost(word('b'), 1.5));
    expect(withChildren(range(word('a'), word('b'), true, false), [word('c'), word('d')])).toEqual(
      range(word('c'), word('d'), true, false),
    );
  });

  it('keeps undeclared properties', () => {
    const decoyed = { ...and(word('a')), note: 'kept' };
    expect(withChildren(decoyed, [word('b')])).toHaveProperty('note', 'kept');
  });

  it('does not modify the original node', () => {
    const original = group(word('a'));
    withChildren(original, [word('b')]);
    expect(original.expr).toEqual(word('a'));
  });

  it('returns a leaf unchanged for an empty child list', () => {
    const leaf = word('a');
    expect(withChildren(leaf, [])).toBe(leaf);
  });

  it('rejects children for a leaf', () => {
    expect(() => withChildren(word('a'), [word('b')])).toThrow(NodeArityError);
  });

  it('rejects a group without its child', () => {
    expect(() => withChildren(group(word('a')), [])).toThrow('A group node takes exactly 1 child, got 0');
  });

  it('rejects a range with a missing bound', () => {
    expect(() => withChildren(range(word('a'), word('b')), [word('a')])).toThrow(
      'A range node takes exactly 2 children, got 1',
    );
  });
});

describe('attributesOf', () => {
  it('lists declared attributes only', () => {
    expect(attributesOf(word('a'))).toEqual(['a']);
    expect(attributesOf(searchField('title', word('a')))).toEqual(['title']);
    expect(attributesOf(fuzzy(word('a'), 0.7))).toEqual([0.7]);
    expect(attributesOf(boost(word('a'), 3))).toEqual([3]);
    expect(attributesOf(range(word('a'), word('b'), false, true))).toEqual([false, true]);
    expect(attributesOf(and(word('a')))).toEqual([]);
    expect(attributesOf(NONE_ITEM)).toEqual([]);
  });
});

describe('nodesEqual', () => {
  it('compares nested trees structurally', () => {
    const build = () => and(or(word('a'), phrase('b')), searchField('f', proximity(phrase('c d'), 2)));
    expect(nodesEqual(build(), build())).toBe(true);
  });

  it('treats every NONE_ITEM as equal', () => {
    expect(nodesEqual(NONE_ITEM, { kind: 'noneItem' })).toBe(true);
    expect(nodesEqual(and(NONE_ITEM), and(NONE_ITEM))).toBe(true);
  });

  it('is sensitive to operand order', () => {
    expect(nodesEqual(and(word('a'), word('b')), and(word('b'), word('a')))).toBe(false);
  });

  it('is sensitive to attributes', () => {
    expect(nodesEqual(proximity(phrase('a'), 1), proximity(phrase('a'), 2))).toBe(false);
    expect(nodesEqual(searchField('a', word('x')), searchField('b', word('x')))).toBe(false);
  });

  it('distinguishes operation kinds', () => {
    expect(nodesEqual(and(word('a')), or(word('a')))).toBe(false);
  });

  it('distinguishes operand counts', () => {
    expect(nodesEqual(and(word('a')), and(word('a'), word('a')))).toBe(false);
  });

  it('ignores undeclared properties', () => {
    const decoyed = { ...and(word('a')), misleading: [] };
    expect(nodesEqual(decoyed, and(word('a')))).toBe(true);
  });
});
