import pg from 'pg';
import type { DistanceType, PgVectorStoreConfig } from '../../config.js';
import { SchemaValidationError } from '../../errors.js';

export interface PgDistance {
  /** pgvector distance operator. */
  operator: string;
  /** Operator class used by HNSW / IVFFlat indexes. */
  opsClass: string;
  toScore(distance: number): number;
  /** Largest distance that still satisfies a similarity threshold. */
  maxDistance(similarityThreshold: number): number;
}

export const PG_DISTANCES: Readonly<Record<DistanceType, PgDistance>> = {
  COSINE_DISTANCE: {
    operator: '<=>',
    opsClass: 'vector_cosine_ops',
    toScore: (distance) => 1 - distance,
    maxDistance: (threshold) => 1 - threshold,
  },
  EUCLIDEAN_DISTANCE: {
    operator: '<->',
    opsClass: 'vector_l2_ops',
    toScore: (distance) => 1 - distance,
    maxDistance: (threshold) => 1 - threshold,
  },
  // <#> returns the negated inner product
  NEGATIVE_INNER_PRODUCT: {
    operator: '<#>',
    opsClass: 'vector_ip_ops',
    toScore: (distance) => -distance,
    maxDistance: (threshold) => -threshold,
  },
};

const SAFE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const REQUIRED_COLUMNS = ['id', 'content', 'metadata', 'embedding'] as const;

export function qualifiedTableName(config: Pick<PgVectorStoreConfig, 'schemaName' | 'tableName'>): string {
  return `${pg.escapeIdentifier(config.schemaName)}.${pg.escapeIdentifier(config.tableName)}`;
}

/**
 * DDL for bootstrapping the store, in execution order. Every statement is
 * idempotent except the optional DROP TABLE.
 */
export function schemaStatements(config: PgVectorStoreConfig, dimensions: number): string[] {
  const table = qualifiedTableName(config);
  const distance = PG_DISTANCES[config.distanceType];

  const statements = [
    'CREATE EXTENSION IF NOT EXISTS vector',
    `CREATE SCHEMA IF NOT EXISTS ${pg.escapeIdentifier(config.schemaName)}`,
  ];

  if (config.removeExistingVectorStoreTable) {
    statements.push(`DROP TABLE IF EXISTS ${table}`);
  }

  statements.push(
    `
CREATE TABLE IF NOT EXISTS ${table} (
  id         UUID         PRIMARY KEY DEFAULT gen_random_uuid(),
  content    TEXT,
  metadata   JSONB,
  embedding  VECTOR(${dimensions})
)
`.trim(),
  );

  // jsonb_path_ops supports the @@ operator used by compiled filters
  statements.push(
    `
CREATE INDEX IF NOT EXISTS ${pg.escapeIdentifier(`${config.tableName}_metadata_gin`)}
  ON ${table} USING GIN (metadata jsonb_path_ops)
`.trim(),
  );

  if (config.indexType !== 'NONE') {
    statements.push(
      `
CREATE INDEX IF NOT EXISTS ${pg.escapeIdentifier(`${config.tableName}_embedding_${config.indexType.toLowerCase()}`)}
  ON ${table} USING ${config.indexType} (embedding ${distance.opsClass})
`.trim(),
    );
  }

  return statements;
}

export async function applySchema(
  client: pg.ClientBase,
  config: PgVectorStoreConfig,
  dimensions: number,
): Promise<void> {
  for (const statement of schemaStatements(config, dimensions)) {
    await client.query(statement);
  }
}

/**
 * Checks that the configured names are plain identifiers and that the vector
 * extension, the table and its columns exist.
 */
export async function validateSchema(client: pg.ClientBase, config: PgVectorStoreConfig): Promise<void> {
  for (const identifier of [config.schemaName, config.tableName]) {
    if (!SAFE_IDENTIFIER.test(identifier)) {
      throw new SchemaValidationError(
        identifier,
        `'${identifier}' is not a valid identifier: use letters, digits and underscores only`,
      );
    }
  }

  const extension = await client.query<{ present: boolean }>(
    "SELECT EXISTS (SELECT 1 FROM pg_extension WHERE extname = 'vector') AS present",
  );
  if (extension.rows[0]?.present !== true) {
    throw new SchemaValidationError('vector', 'The pgvector extension is not installed');
  }

  const columns = await client.query<{ column_name: string }>(
    `SELECT column_name
     FROM information_schema.columns
     WHERE table_schema = $1 AND table_name = $2`,
    [config.schemaName, config.tableName],
  );
  if (columns.rows.length === 0) {
    throw new SchemaValidationError(
      `${config.schemaName}.${config.tableName}`,
      `Table ${config.schemaName}.${config.tableName} does not exist`,
    );
  }

  const present = new Set(columns.rows.map((row) => row.column_name));
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new SchemaValidationError(
      `${config.schemaName}.${config.tableName}`,
      `Table ${config.schemaName}.${config.tableName} is missing columns: ${missing.join(', ')}`,
    );
  }
}
