import pg from 'pg';
import { isListComparison } from './types.js';
import type { Comparison, Expression, ScalarOperator, Value } from './types.js';

export interface CompiledPgFilter {
  sql: string;
  params: unknown[];
}

export interface PgFilterOptions {
  /** JSONB column holding document metadata. Defaults to `metadata`. */
  column?: string;
  /**
   * Number of parameters that precede this fragment in the caller's statement.
   * When 2, placeholders start at $3.
   */
  paramOffset?: number;
}

const JSON_PATH_OPERATORS: Readonly<Record<ScalarOperator, string>> = {
  EQ: '==',
  NE: '!=',
  GT: '>',
  GTE: '>=',
  LT: '<',
  LTE: '<=',
};

export const NO_PG_FILTER: Readonly<CompiledPgFilter> = Object.freeze({ sql: 'TRUE', params: [] });

/**
 * Renders one comparison as a jsonpath predicate, e.g. `$."author" == "john"`.
 * Keys and strings go through JSON quoting; the result is only ever bound as a
 * parameter, never spliced into SQL.
 */
export function jsonPathPredicate(key: string, operator: ScalarOperator, value: Value): string {
  const literal = typeof value === 'string' ? JSON.stringify(value) : String(value);
  return `$.${JSON.stringify(key)} ${JSON_PATH_OPERATORS[operator]} ${literal}`;
}

function compileComparison(
  node: Comparison,
  column: string,
  params: unknown[],
  counter: { n: number },
): string {
  const predicate = (operator: ScalarOperator, value: Value): string => {
    params.push(jsonPathPredicate(node.key, operator, value));
    counter.n += 1;
    return `${column} @@ $${counter.n}::jsonpath`;
  };

  if (!isListComparison(node)) {
    return node.operator === 'NE'
      ? `(${predicate('EQ', node.value)}) IS NOT TRUE`
      : predicate(node.operator, node.value);
  }

  const equalities = node.value.map((value) => predicate('EQ', value));
  const anyOf = `(${equalities.join(' OR ')})`;
  return node.operator === 'IN' ? anyOf : `${anyOf} IS NOT TRUE`;
}

function compileNode(
  node: Expression,
  column: string,
  params: unknown[],
  counter: { n: number },
): string {
  switch (node.kind) {
    case 'comparison':
      return compileComparison(node, column, params, counter);

    case 'and': {
      const parts = node.children.map((child) => compileNode(child, column, params, counter));
      return `(${parts.join(' AND ')})`;
    }

    case 'or': {
      const parts = node.children.map((child) => compileNode(child, column, params, counter));
      return `(${parts.join(' OR ')})`;
    }

    case 'not':
      return `(${compileNode(node.child, column, params, counter)}) IS NOT TRUE`;

    default: {
      const impossible: never = node;
      throw new Error(`Unknown expression node ${JSON.stringify(impossible)}`);
    }
  }
}

/**
 * Compiles an expression into a WHERE-clause fragment over a JSONB metadata
 * column. A comparison against a missing key or a value of another type does
 * not match. NE, NIN and NOT match exactly the documents the positive
 * comparison does not: `@@` yields NULL when jsonpath evaluates to unknown,
 * and `IS NOT TRUE` counts that NULL as a non-match.
 */
export function compilePgFilter(
  expression: Expression | null | undefined,
  options: PgFilterOptions = {},
): CompiledPgFilter {
  if (expression === null || expression === undefined) {
    return { sql: NO_PG_FILTER.sql, params: [] };
  }

  const column = pg.escapeIdentifier(options.column ?? 'metadata');
  const params: unknown[] = [];
  const counter = { n: options.paramOffset ?? 0 };
  const sql = compileNode(expression, column, params, counter);

  return { sql, params };
}
