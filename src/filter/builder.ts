import { FilterValidationError } from '../errors.js';
import type {
  Expression,
  ListComparison,
  ListOperator,
  LogicalExpression,
  NotExpression,
  ScalarComparison,
  ScalarOperator,
  Value,
} from './types.js';

function checkKey(key: string): void {
  if (key.length === 0) {
    throw new FilterValidationError('Filter key must be a non-empty string');
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return String(value);
  return typeof value;
}

// Values also arrive from parsed search requests, so the runtime type is checked too.
function checkValue(key: string, value: unknown): Value {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new FilterValidationError(
    `Value for '${key}' must be a string, boolean or finite number, got ${describeValue(value)}`,
  );
}

export function scalarComparison(operator: ScalarOperator, key: string, value: Value): ScalarComparison {
  checkKey(key);
  return { kind: 'comparison', key, operator, value: checkValue(key, value) };
}

export function listComparison(operator: ListOperator, key: string, values: readonly Value[]): ListComparison {
  checkKey(key);
  if (!Array.isArray(values) || values.length === 0) {
    throw new FilterValidationError(`${operator} on '${key}' requires a non-empty value list`);
  }
  return {
    kind: 'comparison',
    key,
    operator,
    value: Object.freeze(values.map((v) => checkValue(key, v))),
  };
}

/**
 * Builds an and/or node from its operands. Operands of the same kind are
 * spliced in rather than nested, so `and(and(a, b), c)` and `and(a, b, c)`
 * produce the same tree.
 */
export function logical(kind: LogicalExpression['kind'], operands: readonly Expression[]): LogicalExpression {
  if (operands.length < 2) {
    throw new FilterValidationError(`${kind.toUpperCase()} requires at least two operands, got ${operands.length}`);
  }
  const children: Expression[] = [];
  for (const operand of operands) {
    if (operand.kind === kind) {
      children.push(...operand.children);
    } else {
      children.push(operand);
    }
  }
  return { kind, children: Object.freeze(children) };
}

export function negate(child: Expression): NotExpression {
  return { kind: 'not', child };
}
