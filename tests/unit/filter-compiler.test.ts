import { describe, it, expect } from 'vitest';
import { compile, toExpression } from '../../src/filter/compiler.js';
import { filter } from '../../src/filter/filter-object.js';
import { FilterParseError } from '../../src/errors.js';

describe('toExpression', () => {
  it('passes trees through and parses text', () => {
    const tree = filter.eq('a', 1);
    expect(toExpression(tree)).toBe(tree);
    expect(toExpression('a == 1')).toEqual(tree);
  });

  it('maps null, undefined and blank text to no filter', () => {
    expect(toExpression(null)).toBeNull();
    expect(toExpression(undefined)).toBeNull();
    expect(toExpression('  ')).toBeNull();
  });
});

describe('compile', () => {
  it('compiles text for pgvector', () => {
    expect(compile("author == 'x'", 'pgvector')).toEqual({
      sql: '"metadata" @@ $1::jsonpath',
      params: ['$."author" == "x"'],
    });
  });

  it('compiles text for mongodb', () => {
    expect(compile("author == 'x'", 'mongodb')).toEqual({ 'metadata.author': 'x' });
  });

  it('forwards target options', () => {
    expect(compile(filter.eq('a', 1), 'pgvector', { paramOffset: 1 }).sql).toBe('"metadata" @@ $2::jsonpath');
    expect(compile(filter.in('a', [1, 2]), 'mongodb', { useInOperator: true })).toEqual({
      'metadata.a': { $in: [1, 2] },
    });
  });

  it('treats an empty filter as match-all on both targets', () => {
    expect(compile('', 'pgvector')).toEqual({ sql: 'TRUE', params: [] });
    expect(compile(null, 'mongodb')).toEqual({});
  });

  it('throws FilterParseError for malformed text', () => {
    expect(() => compile('a ==', 'mongodb')).toThrow(FilterParseError);
    expect(() => compile('a ==', 'pgvector')).toThrow(FilterParseError);
  });

  it('built and parsed trees compile identically', () => {
    const text = "(genre in ['sci-fi', 'fantasy'] || year >= 2000) && !(author == 'anon')";
    const built = filter.and(
      filter.or(filter.in('genre', ['sci-fi', 'fantasy']), filter.gte('year', 2000)),
      filter.not(filter.eq('author', 'anon')),
    );
    expect(compile(text, 'pgvector')).toEqual(compile(built, 'pgvector'));
    expect(compile(text, 'mongodb')).toEqual(compile(built, 'mongodb'));
  });
});
