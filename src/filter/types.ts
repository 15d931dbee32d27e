export type Value = string | number | boolean;

export type ScalarOperator = 'EQ' | 'NE' | 'GT' | 'GTE' | 'LT' | 'LTE';
export type ListOperator = 'IN' | 'NIN';
export type ComparisonOperator = ScalarOperator | ListOperator;

export type ScalarComparison = {
  kind: 'comparison';
  key: string;
  operator: ScalarOperator;
  value: Value;
};

export type ListComparison = {
  kind: 'comparison';
  key: string;
  operator: ListOperator;
  value: readonly Value[];
};

export type Comparison = ScalarComparison | ListComparison;

export type AndExpression = {
  kind: 'and';
  children: readonly Expression[];
};

export type OrExpression = {
  kind: 'or';
  children: readonly Expression[];
};

export type NotExpression = {
  kind: 'not';
  child: Expression;
};

/**
 * Metadata filter tree. Built with the `filter` primitives or parsed from
 * text; never construct nodes by hand, the factories keep the tree in
 * canonical form (no logical node directly nests one of the same kind).
 */
export type Expression = Comparison | AndExpression | OrExpression | NotExpression;

export type LogicalExpression = AndExpression | OrExpression;

export const LIST_OPERATORS: ReadonlySet<ComparisonOperator> = new Set<ComparisonOperator>(['IN', 'NIN']);

export function isListComparison(node: Comparison): node is ListComparison {
  return LIST_OPERATORS.has(node.operator);
}
