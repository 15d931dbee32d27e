export { filter } from './filter-object.js';
export { parseFilter } from './parser.js';
export { formatExpression } from './format.js';
export { collectKeys } from './keys.js';
export { compile, toExpression } from './compiler.js';
export type { FilterTarget, FilterInput } from './compiler.js';
export { compilePgFilter, jsonPathPredicate } from './compile-pg.js';
export type { CompiledPgFilter, PgFilterOptions } from './compile-pg.js';
export { compileMongoFilter } from './compile-mongo.js';
export type { MongoFilterDocument, MongoFilterOptions } from './compile-mongo.js';
export type {
  Value,
  ScalarOperator,
  ListOperator,
  ComparisonOperator,
  ScalarComparison,
  ListComparison,
  Comparison,
  AndExpression,
  OrExpression,
  NotExpression,
  LogicalExpression,
  Expression,
} from './types.js';
