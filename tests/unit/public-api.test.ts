import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the filter builder, parser and compiler', async () => {
    const { filter, parseFilter, compile, formatExpression } = await import('../../src/index.js');
    expect(typeof filter.eq).toBe('function');
    expect(typeof filter.and).toBe('function');
    expect(typeof parseFilter).toBe('function');
    expect(typeof compile).toBe('function');
    expect(typeof formatExpression).toBe('function');
  });

  it('exports both store classes', async () => {
    const { PgVectorStore, MongoDBAtlasVectorStore } = await import('../../src/index.js');
    expect(typeof PgVectorStore).toBe('function');
    expect(typeof MongoDBAtlasVectorStore).toBe('function');
  });

  it('exports the filter entry point', async () => {
    const { compile, parseFilter } = await import('../../src/filter/index.js');
    expect(compile(parseFilter("a == 'b'"), 'mongodb')).toEqual({ 'metadata.a': 'b' });
  });

  it('exports FilterParseError as a class usable with instanceof', async () => {
    const { FilterParseError, parseFilter } = await import('../../src/index.js');
    let caught: unknown;
    try {
      parseFilter('a ==');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FilterParseError);
    expect(caught).toBeInstanceOf(Error);
  });

  it('does NOT export the parser internals', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['Parser']).toBeUndefined();
    expect((api as Record<string, unknown>)['scalarComparison']).toBeUndefined();
  });

  it('does NOT export the SQL compilers (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['compileSearchQuery']).toBeUndefined();
    expect((api as Record<string, unknown>)['mapSearchRow']).toBeUndefined();
  });
});
