import { compileMongoFilter } from './compile-mongo.js';
import type { MongoFilterDocument, MongoFilterOptions } from './compile-mongo.js';
import { compilePgFilter } from './compile-pg.js';
import type { CompiledPgFilter, PgFilterOptions } from './compile-pg.js';
import { parseFilter } from './parser.js';
import type { Expression } from './types.js';

export type FilterTarget = 'pgvector' | 'mongodb';

export type FilterInput = Expression | string | null | undefined;

/** Parses text input; trees and "no filter" pass through unchanged. */
export function toExpression(input: FilterInput): Expression | null {
  if (input === null || input === undefined) {
    return null;
  }
  return typeof input === 'string' ? parseFilter(input) : input;
}

/**
 * Compiles a filter for the given backend. Text is parsed first and may throw
 * FilterParseError; a parsed or built tree always compiles.
 */
export function compile(input: FilterInput, target: 'pgvector', options?: PgFilterOptions): CompiledPgFilter;
export function compile(input: FilterInput, target: 'mongodb', options?: MongoFilterOptions): MongoFilterDocument;
export function compile(
  input: FilterInput,
  target: FilterTarget,
  options: PgFilterOptions & MongoFilterOptions = {},
): CompiledPgFilter | MongoFilterDocument {
  const expression = toExpression(input);
  return target === 'pgvector' ? compilePgFilter(expression, options) : compileMongoFilter(expression, options);
}
