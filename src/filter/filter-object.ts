import { listComparison, logical, negate, scalarComparison } from './builder.js';
import type { Expression, Value } from './types.js';

/**
 * Entry point for building filter expressions in code.
 *
 * @example
 * filter.and(
 *   filter.in('author', ['john', 'jill']),
 *   filter.eq('article_type', 'blog'),
 * )
 */
export const filter = {
  eq(key: string, value: Value): Expression {
    return scalarComparison('EQ', key, value);
  },
  ne(key: string, value: Value): Expression {
    return scalarComparison('NE', key, value);
  },
  gt(key: string, value: Value): Expression {
    return scalarComparison('GT', key, value);
  },
  gte(key: string, value: Value): Expression {
    return scalarComparison('GTE', key, value);
  },
  lt(key: string, value: Value): Expression {
    return scalarComparison('LT', key, value);
  },
  lte(key: string, value: Value): Expression {
    return scalarComparison('LTE', key, value);
  },
  in(key: string, values: readonly Value[]): Expression {
    return listComparison('IN', key, values);
  },
  nin(key: string, values: readonly Value[]): Expression {
    return listComparison('NIN', key, values);
  },
  and(first: Expression, second: Expression, ...rest: Expression[]): Expression {
    return logical('and', [first, second, ...rest]);
  },
  or(first: Expression, second: Expression, ...rest: Expression[]): Expression {
    return logical('or', [first, second, ...rest]);
  },
  not(child: Expression): Expression {
    return negate(child);
  },
};
