import type { ScoredDocument } from '../../types.js';
import type { PgDistance } from './schema.js';

export type SearchRow = {
  id: string;                                 // pg returns UUID as string
  content: string | null;
  metadata: Record<string, unknown> | null;   // pg auto-parses JSONB
  distance: number;                           // float8
};

export function mapSearchRow(row: SearchRow, distance: PgDistance): ScoredDocument {
  return {
    document: {
      id: row.id,
      content: row.content ?? '',
      metadata: row.metadata ?? {},
    },
    score: distance.toScore(row.distance),
  };
}
