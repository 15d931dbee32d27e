import { FilterValidationError } from '../errors.js';
import { isListComparison } from './types.js';
import type { ComparisonOperator, Expression, Value } from './types.js';

const SYMBOLS: Readonly<Record<ComparisonOperator, string>> = {
  EQ: '==',
  NE: '!=',
  GT: '>',
  GTE: '>=',
  LT: '<',
  LTE: '<=',
  IN: 'in',
  NIN: 'nin',
};

const KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

function formatValue(value: Value): string {
  if (typeof value === 'string') {
    const escaped = value
      .replace(/\\/g, '\\\\')
      .replace(/'/g, "\\'")
      .replace(/\n/g, '\\n')
      .replace(/\r/g, '\\r')
      .replace(/\t/g, '\\t');
    return `'${escaped}'`;
  }
  return String(value);
}

/**
 * Prints an expression as filter text that parses back to the same tree.
 * Parentheses are only added where precedence requires them.
 */
export function formatExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'comparison': {
      // A leading NOT is read as negation, so such a key cannot start a comparison.
      if (!KEY.test(expression.key) || expression.key.toUpperCase() === 'NOT') {
        throw new FilterValidationError(`Key '${expression.key}' cannot be written as filter text`);
      }
      const symbol = SYMBOLS[expression.operator];
      const value = isListComparison(expression)
        ? `[${expression.value.map(formatValue).join(', ')}]`
        : formatValue(expression.value);
      return `${expression.key} ${symbol} ${value}`;
    }

    case 'and':
      return expression.children
        .map((child) => (child.kind === 'or' ? `(${formatExpression(child)})` : formatExpression(child)))
        .join(' && ');

    case 'or':
      return expression.children.map(formatExpression).join(' || ');

    case 'not':
      return `!(${formatExpression(expression.child)})`;

    default: {
      const impossible: never = expression;
      throw new Error(`Unknown expression node ${JSON.stringify(impossible)}`);
    }
  }
}
