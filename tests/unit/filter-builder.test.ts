import { describe, it, expect } from 'vitest';
import { filter } from '../../src/filter/filter-object.js';
import { logical } from '../../src/filter/builder.js';
import { FilterValidationError } from '../../src/errors.js';
import type { Value } from '../../src/filter/types.js';

describe('filter builder: comparisons', () => {
  it('filter.eq produces an EQ comparison node', () => {
    expect(filter.eq('author', 'john')).toEqual({
      kind: 'comparison',
      key: 'author',
      operator: 'EQ',
      value: 'john',
    });
  });

  it.each([
    ['ne', 'NE'],
    ['gt', 'GT'],
    ['gte', 'GTE'],
    ['lt', 'LT'],
    ['lte', 'LTE'],
  ] as const)('filter.%s maps to operator %s', (method, operator) => {
    expect(filter[method]('year', 2020)).toEqual({ kind: 'comparison', key: 'year', operator, value: 2020 });
  });

  it('filter.in and filter.nin carry the value list', () => {
    expect(filter.in('author', ['john', 'jill'])).toEqual({
      kind: 'comparison',
      key: 'author',
      operator: 'IN',
      value: ['john', 'jill'],
    });
    expect(filter.nin('year', [2019, 2020])).toEqual({
      kind: 'comparison',
      key: 'year',
      operator: 'NIN',
      value: [2019, 2020],
    });
  });

  it('copies and freezes the value list', () => {
    const values: Value[] = ['a', 'b'];
    const node = filter.in('k', values);
    values.push('c');
    expect(node).toEqual({ kind: 'comparison', key: 'k', operator: 'IN', value: ['a', 'b'] });
    if (node.kind !== 'comparison') throw new Error('expected comparison');
    expect(Object.isFrozen(node.value)).toBe(true);
  });

  it('accepts booleans and negative numbers', () => {
    expect(filter.eq('published', false)).toMatchObject({ value: false });
    expect(filter.gt('delta', -1.5)).toMatchObject({ value: -1.5 });
  });

  it('rejects an empty key', () => {
    expect(() => filter.eq('', 1)).toThrow(FilterValidationError);
  });

  it('rejects an empty IN list', () => {
    expect(() => filter.in('author', [])).toThrow("IN on 'author' requires a non-empty value list");
  });

  it('rejects an empty NIN list', () => {
    expect(() => filter.nin('author', [])).toThrow(FilterValidationError);
  });

  it('rejects NaN and infinite numbers', () => {
    expect(() => filter.eq('x', Number.NaN)).toThrow(
      "Value for 'x' must be a string, boolean or finite number, got NaN",
    );
    expect(() => filter.gt('x', Number.POSITIVE_INFINITY)).toThrow(FilterValidationError);
  });

  it('rejects null smuggled in through an untyped caller', () => {
    const untyped = JSON.parse('null') as Value;
    expect(() => filter.eq('x', untyped)).toThrow(
      "Value for 'x' must be a string, boolean or finite number, got null",
    );
  });

  it('rejects a non-scalar inside a list', () => {
    const untyped = JSON.parse('[1, {"a": 2}]') as Value[];
    expect(() => filter.in('x', untyped)).toThrow(
      "Value for 'x' must be a string, boolean or finite number, got object",
    );
  });
});

describe('filter builder: logical nodes', () => {
  const a = filter.eq('a', 1);
  const b = filter.eq('b', 2);
  const c = filter.eq('c', 3);

  it('filter.and with two operands', () => {
    expect(filter.and(a, b)).toEqual({ kind: 'and', children: [a, b] });
  });

  it('flattens nested AND on the left and right', () => {
    expect(filter.and(filter.and(a, b), c)).toEqual({ kind: 'and', children: [a, b, c] });
    expect(filter.and(a, filter.and(b, c))).toEqual({ kind: 'and', children: [a, b, c] });
  });

  it('flattens nested OR', () => {
    expect(filter.or(a, filter.or(b, c))).toEqual({ kind: 'or', children: [a, b, c] });
  });

  it('keeps an OR nested inside an AND', () => {
    expect(filter.and(a, filter.or(b, c))).toEqual({
      kind: 'and',
      children: [a, { kind: 'or', children: [b, c] }],
    });
  });

  it('does not flatten through NOT', () => {
    const negated = filter.not(filter.and(a, b));
    expect(filter.and(negated, c)).toEqual({ kind: 'and', children: [negated, c] });
  });

  it('filter.not wraps its child', () => {
    expect(filter.not(a)).toEqual({ kind: 'not', child: a });
  });

  it('freezes the children array', () => {
    const node = filter.or(a, b);
    if (node.kind !== 'or') throw new Error('expected or');
    expect(Object.isFrozen(node.children)).toBe(true);
  });

  it('logical() rejects fewer than two operands', () => {
    expect(() => logical('and', [a])).toThrow('AND requires at least two operands, got 1');
    expect(() => logical('or', [])).toThrow('OR requires at least two operands, got 0');
  });
});
