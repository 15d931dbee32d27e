import type { Document } from 'mongodb';
import { isListComparison } from './types.js';
import type { Comparison, Expression, ScalarOperator, Value } from './types.js';

export type MongoFilterDocument = Document;

export interface MongoFilterOptions {
  /** Document field that nests the metadata. Defaults to `metadata`; '' filters top-level fields. */
  metadataPath?: string;
  /** Emit `$in` / `$nin` instead of `$or` of equalities / `$and` of `$ne`. */
  useInOperator?: boolean;
}

const MONGO_OPERATORS: Readonly<Record<Exclude<ScalarOperator, 'EQ'>, string>> = {
  NE: '$ne',
  GT: '$gt',
  GTE: '$gte',
  LT: '$lt',
  LTE: '$lte',
};

function compileComparison(node: Comparison, field: string, useInOperator: boolean): MongoFilterDocument {
  if (!isListComparison(node)) {
    if (node.operator === 'EQ') {
      return { [field]: node.value };
    }
    return { [field]: { [MONGO_OPERATORS[node.operator]]: node.value } };
  }

  const values: Value[] = [...node.value];

  if (useInOperator) {
    return { [field]: { [node.operator === 'IN' ? '$in' : '$nin']: values } };
  }

  if (node.operator === 'IN') {
    const equalities = values.map((value): MongoFilterDocument => ({ [field]: value }));
    return equalities.length === 1 && equalities[0] !== undefined ? equalities[0] : { $or: equalities };
  }

  const exclusions = values.map((value): MongoFilterDocument => ({ [field]: { $ne: value } }));
  return exclusions.length === 1 && exclusions[0] !== undefined ? exclusions[0] : { $and: exclusions };
}

function compileNode(node: Expression, options: Required<MongoFilterOptions>): MongoFilterDocument {
  switch (node.kind) {
    case 'comparison': {
      const field = options.metadataPath === '' ? node.key : `${options.metadataPath}.${node.key}`;
      return compileComparison(node, field, options.useInOperator);
    }

    case 'and':
      return { $and: node.children.map((child) => compileNode(child, options)) };

    case 'or':
      return { $or: node.children.map((child) => compileNode(child, options)) };

    case 'not':
      return { $nor: [compileNode(node.child, options)] };

    default: {
      const impossible: never = node;
      throw new Error(`Unknown expression node ${JSON.stringify(impossible)}`);
    }
  }
}

/**
 * Compiles an expression into a MongoDB query document usable as a
 * `$vectorSearch` pre-filter or a `find`/`deleteMany` filter. `$ne`, `$nin`
 * and `$nor` also match documents where the field is missing or holds
 * another BSON type, so negations match exactly what the positive
 * comparison does not.
 */
export function compileMongoFilter(
  expression: Expression | null | undefined,
  options: MongoFilterOptions = {},
): MongoFilterDocument {
  if (expression === null || expression === undefined) {
    return {};
  }

  return compileNode(expression, {
    metadataPath: options.metadataPath ?? 'metadata',
    useInOperator: options.useInOperator ?? false,
  });
}
