import type { Expression } from './types.js';

/** Metadata keys referenced anywhere in the expression, in first-seen order. */
export function collectKeys(expression: Expression | null): string[] {
  const keys = new Set<string>();

  const visit = (node: Expression): void => {
    switch (node.kind) {
      case 'comparison':
        keys.add(node.key);
        return;
      case 'and':
      case 'or':
        node.children.forEach(visit);
        return;
      case 'not':
        visit(node.child);
        return;
    }
  };

  if (expression !== null) {
    visit(expression);
  }
  return [...keys];
}
