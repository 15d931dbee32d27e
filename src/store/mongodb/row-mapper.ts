import type { Document } from 'mongodb';
import { VectorStoreError } from '../../errors.js';
import type { ScoredDocument } from '../../types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Aggregation results are untyped; narrow each field instead of trusting a generic.
export function mapSearchResult(row: Document): ScoredDocument {
  const id: unknown = row['_id'];
  const content: unknown = row['content'];
  const metadata: unknown = row['metadata'];
  const score: unknown = row['score'];

  if (typeof score !== 'number') {
    throw new VectorStoreError(`Search result ${String(id)} has no vectorSearchScore`);
  }

  return {
    document: {
      id: String(id),
      content: typeof content === 'string' ? content : '',
      metadata: isRecord(metadata) ? metadata : {},
    },
    score,
  };
}
