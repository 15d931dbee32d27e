import { describe, it, expect } from 'vitest';
import { compilePgFilter, jsonPathPredicate } from '../../src/filter/compile-pg.js';
import { parseFilter } from '../../src/filter/parser.js';
import { filter } from '../../src/filter/filter-object.js';

describe('jsonPathPredicate', () => {
  it('quotes keys and string values as JSON', () => {
    expect(jsonPathPredicate('author', 'EQ', 'john')).toBe('$."author" == "john"');
  });

  it('writes numbers and booleans bare', () => {
    expect(jsonPathPredicate('k', 'LTE', -1.5)).toBe('$."k" <= -1.5');
    expect(jsonPathPredicate('k', 'NE', true)).toBe('$."k" != true');
  });

  it('escapes double quotes inside keys', () => {
    expect(jsonPathPredicate('we"ird', 'GT', 1)).toBe('$."we\\"ird" > 1');
  });
});

describe('compilePgFilter', () => {
  it('compiles no filter to TRUE', () => {
    expect(compilePgFilter(null)).toEqual({ sql: 'TRUE', params: [] });
    expect(compilePgFilter(undefined)).toEqual({ sql: 'TRUE', params: [] });
  });

  it('compiles a single comparison to one jsonpath parameter', () => {
    expect(compilePgFilter(filter.gt('year', 2020))).toEqual({
      sql: '"metadata" @@ $1::jsonpath',
      params: ['$."year" > 2020'],
    });
  });

  it('compiles IN with AND', () => {
    const compiled = compilePgFilter(parseFilter("author in ['john','jill'] && article_type == 'blog'"));
    expect(compiled.sql).toBe(
      '(("metadata" @@ $1::jsonpath OR "metadata" @@ $2::jsonpath) AND "metadata" @@ $3::jsonpath)',
    );
    expect(compiled.params).toEqual([
      '$."author" == "john"',
      '$."author" == "jill"',
      '$."article_type" == "blog"',
    ]);
  });

  it('compiles NIN as a disjunction that is not true', () => {
    expect(compilePgFilter(parseFilter('x nin [1, 2]'))).toEqual({
      sql: '("metadata" @@ $1::jsonpath OR "metadata" @@ $2::jsonpath) IS NOT TRUE',
      params: ['$."x" == 1', '$."x" == 2'],
    });
  });

  it('parenthesises a single-value IN', () => {
    expect(compilePgFilter(filter.in('x', ['a']))).toEqual({
      sql: '("metadata" @@ $1::jsonpath)',
      params: ['$."x" == "a"'],
    });
  });

  it('compiles OR and NOT', () => {
    expect(compilePgFilter(parseFilter("a == true || b != 'x'"))).toEqual({
      sql: '("metadata" @@ $1::jsonpath OR ("metadata" @@ $2::jsonpath) IS NOT TRUE)',
      params: ['$."a" == true', '$."b" == "x"'],
    });
    expect(compilePgFilter(parseFilter('!(a > 5)'))).toEqual({
      sql: '("metadata" @@ $1::jsonpath) IS NOT TRUE',
      params: ['$."a" > 5'],
    });
  });

  it('compiles NE, single-value NIN and NOT of EQ to the same negated equality', () => {
    const expected = { sql: '("metadata" @@ $1::jsonpath) IS NOT TRUE', params: ['$."a" == "x"'] };
    expect(compilePgFilter(parseFilter("a != 'x'"))).toEqual(expected);
    expect(compilePgFilter(parseFilter("a nin ['x']"))).toEqual(expected);
    expect(compilePgFilter(parseFilter("!(a == 'x')"))).toEqual(expected);
  });

  it('negates compound children as a whole', () => {
    expect(compilePgFilter(parseFilter('!(a == 1 && b != 2)'))).toEqual({
      sql: '(("metadata" @@ $1::jsonpath AND ("metadata" @@ $2::jsonpath) IS NOT TRUE)) IS NOT TRUE',
      params: ['$."a" == 1', '$."b" == 2'],
    });
  });

  it('keeps precedence explicit in the SQL', () => {
    expect(compilePgFilter(parseFilter('a == 1 || b == 2 && c == 3')).sql).toBe(
      '("metadata" @@ $1::jsonpath OR ("metadata" @@ $2::jsonpath AND "metadata" @@ $3::jsonpath))',
    );
  });

  it('numbers placeholders after paramOffset', () => {
    expect(compilePgFilter(filter.and(filter.eq('a', 1), filter.eq('b', 2)), { paramOffset: 2 }).sql).toBe(
      '("metadata" @@ $3::jsonpath AND "metadata" @@ $4::jsonpath)',
    );
  });

  it('quotes a custom column name', () => {
    expect(compilePgFilter(filter.eq('a', 1), { column: 'meta"data' }).sql).toBe('"meta""data" @@ $1::jsonpath');
  });

  it('never places user text in the SQL', () => {
    const hostile = 'o\'brien"\\';
    const compiled = compilePgFilter(filter.eq('name', hostile));
    expect(compiled.sql).toBe('"metadata" @@ $1::jsonpath');
    expect(compiled.params).toEqual(['$."name" == "o\'brien\\"\\\\"']);
  });

  it('keeps an injection attempt inside the bound jsonpath string', () => {
    const compiled = compilePgFilter(parseFilter(`name == "x'; DROP TABLE vector_store; --"`));
    expect(compiled.sql).toBe('"metadata" @@ $1::jsonpath');
    expect(compiled.params).toEqual(['$."name" == "x\'; DROP TABLE vector_store; --"']);
  });
});
