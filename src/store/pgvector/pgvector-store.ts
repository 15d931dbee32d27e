import pg from 'pg';
import { parsePgVectorStoreConfig } from '../../config.js';
import type { PgVectorStoreConfig, PgVectorStoreConfigInput } from '../../config.js';
import { VectorStoreError } from '../../errors.js';
import { toExpression } from '../../filter/compiler.js';
import type { FilterInput } from '../../filter/compiler.js';
import { createLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import type {
  BatchingStrategy,
  EmbeddingModel,
  NewDocument,
  ScoredDocument,
  SearchRequest,
  VectorDocument,
  VectorStore,
} from '../../types.js';
import { FixedSizeBatchingStrategy } from '../batching.js';
import { assertDimensions, embedDocuments, resolveDimensions, resolveSearchRequest } from '../documents.js';
import {
  compileDeleteByFilterQuery,
  compileDeleteByIdsQuery,
  compileSearchQuery,
  compileUpsertQuery,
} from './query.js';
import { mapSearchRow } from './row-mapper.js';
import type { SearchRow } from './row-mapper.js';
import { PG_DISTANCES, applySchema, validateSchema } from './schema.js';

export interface PgVectorStoreOptions {
  pool: pg.Pool;
  embeddingModel: EmbeddingModel;
  config?: PgVectorStoreConfigInput;
  /** Defaults to fixed-size batches of `maxDocumentBatchSize`. */
  batchingStrategy?: BatchingStrategy;
  logger?: Logger;
}

export class PgVectorStore implements VectorStore<pg.Pool> {
  readonly name = 'pgvector';
  readonly config: PgVectorStoreConfig;
  private readonly pool: pg.Pool;
  private readonly embeddingModel: EmbeddingModel;
  private readonly batchingStrategy: BatchingStrategy;
  private readonly logger: Logger;
  private dimensions: number | undefined;

  constructor(options: PgVectorStoreOptions) {
    this.config = parsePgVectorStoreConfig(options.config);
    this.pool = options.pool;
    this.embeddingModel = options.embeddingModel;
    this.batchingStrategy =
      options.batchingStrategy ?? new FixedSizeBatchingStrategy(this.config.maxDocumentBatchSize);
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Validates and/or creates the schema when the corresponding flags are
   * set. Neither happens implicitly on first use.
   */
  async initialize(): Promise<void> {
    const dimensions = this.storeDimensions();
    const { schemaName, tableName, schemaValidation, initializeSchema } = this.config;

    if (!schemaValidation && !initializeSchema) {
      this.logger.debug(`[pgvector] Skipping schema setup for ${schemaName}.${tableName}`);
      return;
    }

    const client = await this.pool.connect();
    try {
      if (schemaValidation) {
        await validateSchema(client, this.config);
        this.logger.info(`[pgvector] Schema ${schemaName}.${tableName} validated`);
      }
      if (initializeSchema) {
        await applySchema(client, this.config, dimensions);
        this.logger.info(`[pgvector] Schema ${schemaName}.${tableName} initialized`, {
          dimensions,
          indexType: this.config.indexType,
          distanceType: this.config.distanceType,
        });
      }
    } finally {
      client.release();
    }
  }

  async add(documents: readonly NewDocument[]): Promise<VectorDocument[]> {
    if (documents.length === 0) {
      return [];
    }

    const embedded = await embedDocuments(documents, this.embeddingModel, this.storeDimensions());
    const batches = this.batchingStrategy.batch(embedded);
    this.logger.debug(`[pgvector] Upserting ${embedded.length} documents in ${batches.length} batch(es)`);

    for (const batch of batches) {
      const { sql, params } = compileUpsertQuery(this.config, batch);
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sql, params);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          this.logger.warn(`[pgvector] Rollback failed: ${String(rollbackErr)}`);
        });
        this.logger.error(`[pgvector] Upsert of ${batch.length} documents failed: ${String(err)}`);
        throw err;
      } finally {
        client.release();
      }
    }

    return embedded;
  }

  async delete(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    const { sql, params } = compileDeleteByIdsQuery(this.config, ids);
    const result = await this.pool.query(sql, params);
    this.logger.debug(`[pgvector] Deleted ${result.rowCount ?? 0} documents by id`);
  }

  async deleteByFilter(filterExpression: FilterInput): Promise<void> {
    const expression = toExpression(filterExpression);
    if (expression === null) {
      throw new VectorStoreError('deleteByFilter requires a non-empty filter expression');
    }
    const { sql, params } = compileDeleteByFilterQuery(this.config, expression);
    const result = await this.pool.query(sql, params);
    this.logger.debug(`[pgvector] Deleted ${result.rowCount ?? 0} documents by filter`);
  }

  async similaritySearch(request: SearchRequest | string): Promise<ScoredDocument[]> {
    const resolved = resolveSearchRequest(request);
    const embedding = await this.embeddingModel.embed(resolved.query);
    assertDimensions(embedding, this.storeDimensions());

    const { sql, params } = compileSearchQuery(this.config, resolved, embedding);
    let result: pg.QueryResult<SearchRow>;
    try {
      result = await this.pool.query<SearchRow>(sql, params);
    } catch (err) {
      this.logger.error(`[pgvector] Similarity search failed: ${String(err)}`);
      throw err;
    }

    const distance = PG_DISTANCES[this.config.distanceType];
    return result.rows.map((row) => mapSearchRow(row, distance));
  }

  getNativeClient(): pg.Pool {
    return this.pool;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private storeDimensions(): number {
    if (this.dimensions === undefined) {
      this.dimensions = resolveDimensions(this.config.dimensions, this.embeddingModel);
    }
    return this.dimensions;
  }
}
