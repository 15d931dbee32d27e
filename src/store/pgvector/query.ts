import type { PgVectorStoreConfig } from '../../config.js';
import { compilePgFilter } from '../../filter/compile-pg.js';
import type { Expression } from '../../filter/types.js';
import type { VectorDocument } from '../../types.js';
import type { ResolvedSearchRequest } from '../documents.js';
import { PG_DISTANCES, qualifiedTableName } from './schema.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/** pgvector text representation, e.g. `[0.1,0.2,0.3]`. */
export function toVectorLiteral(embedding: readonly number[]): string {
  return `[${embedding.join(',')}]`;
}

/**
 * Compiles one multi-row upsert for a batch. Existing rows with the same id
 * are overwritten.
 */
export function compileUpsertQuery(
  config: PgVectorStoreConfig,
  documents: ReadonlyArray<VectorDocument & { embedding: number[] }>,
): CompiledQuery {
  const params: unknown[] = [];
  const rows = documents.map((doc) => {
    params.push(doc.id, doc.content, JSON.stringify(doc.metadata), toVectorLiteral(doc.embedding));
    const n = params.length;
    return `($${n - 3}, $${n - 2}, $${n - 1}::jsonb, $${n}::vector)`;
  });

  const sql = [
    `INSERT INTO ${qualifiedTableName(config)} (id, content, metadata, embedding)`,
    `VALUES ${rows.join(', ')}`,
    'ON CONFLICT (id) DO UPDATE SET',
    '  content = EXCLUDED.content, metadata = EXCLUDED.metadata, embedding = EXCLUDED.embedding',
  ].join('\n');

  return { sql, params };
}

export function compileDeleteByIdsQuery(config: PgVectorStoreConfig, ids: readonly string[]): CompiledQuery {
  return {
    sql: `DELETE FROM ${qualifiedTableName(config)} WHERE id = ANY($1::uuid[])`,
    params: [[...ids]],
  };
}

export function compileDeleteByFilterQuery(config: PgVectorStoreConfig, expression: Expression): CompiledQuery {
  const filter = compilePgFilter(expression);
  return {
    sql: `DELETE FROM ${qualifiedTableName(config)} WHERE ${filter.sql}`,
    params: filter.params,
  };
}

/**
 * Compiles a nearest-neighbour query ordered by distance. $1 is always the
 * query vector; filter parameters follow, then the distance bound (when a
 * threshold is set) and the limit.
 */
export function compileSearchQuery(
  config: PgVectorStoreConfig,
  request: ResolvedSearchRequest,
  embedding: readonly number[],
): CompiledQuery {
  const distance = PG_DISTANCES[config.distanceType];
  const params: unknown[] = [toVectorLiteral(embedding)];
  const conditions: string[] = [];

  if (request.filterExpression !== null) {
    const filter = compilePgFilter(request.filterExpression, { paramOffset: params.length });
    params.push(...filter.params);
    conditions.push(filter.sql);
  }

  if (request.similarityThreshold !== undefined) {
    params.push(distance.maxDistance(request.similarityThreshold));
    conditions.push(`embedding ${distance.operator} $1::vector <= $${params.length}`);
  }

  params.push(request.topK);
  const limitRef = `$${params.length}`;

  const sql = [
    `SELECT id, content, metadata, embedding ${distance.operator} $1::vector AS distance`,
    `FROM ${qualifiedTableName(config)}`,
    ...(conditions.length > 0 ? [`WHERE ${conditions.join(' AND ')}`] : []),
    'ORDER BY distance',
    `LIMIT ${limitRef}`,
  ].join('\n');

  return { sql, params };
}
