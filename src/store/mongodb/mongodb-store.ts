import type { AnyBulkWriteOperation, Collection, Db, Document, MongoClient } from 'mongodb';
import { parseMongoDBAtlasStoreConfig } from '../../config.js';
import type { MongoDBAtlasStoreConfig, MongoDBAtlasStoreConfigInput } from '../../config.js';
import { SchemaValidationError, VectorStoreError } from '../../errors.js';
import { compileMongoFilter } from '../../filter/compile-mongo.js';
import { toExpression } from '../../filter/compiler.js';
import type { FilterInput } from '../../filter/compiler.js';
import { collectKeys } from '../../filter/keys.js';
import type { Expression } from '../../filter/types.js';
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
import { searchIndexDefinition, searchPipeline } from './pipeline.js';
import { mapSearchResult } from './row-mapper.js';

export interface MongoDBAtlasVectorStoreOptions {
  client: MongoClient;
  embeddingModel: EmbeddingModel;
  config: MongoDBAtlasStoreConfigInput;
  batchingStrategy?: BatchingStrategy;
  logger?: Logger;
}

const INVALID_DATABASE_CHARS = /[/\\. "$*<>:|?\0]/;
const INVALID_COLLECTION_CHARS = /[$\0]/;

export class MongoDBAtlasVectorStore implements VectorStore<MongoClient> {
  readonly name = 'mongodb-atlas';
  readonly config: MongoDBAtlasStoreConfig;
  private readonly client: MongoClient;
  private readonly embeddingModel: EmbeddingModel;
  private readonly batchingStrategy: BatchingStrategy;
  private readonly logger: Logger;
  private dimensions: number | undefined;

  constructor(options: MongoDBAtlasVectorStoreOptions) {
    this.config = parseMongoDBAtlasStoreConfig(options.config);
    this.client = options.client;
    this.embeddingModel = options.embeddingModel;
    this.batchingStrategy =
      options.batchingStrategy ?? new FixedSizeBatchingStrategy(this.config.maxDocumentBatchSize);
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Validates names and/or creates the collection and its search index when
   * the corresponding flags are set. Collection existence is only required
   * when validation runs without schema initialization.
   */
  async initialize(): Promise<void> {
    const dimensions = this.storeDimensions();
    const { databaseName, collectionName, vectorIndexName, schemaValidation, initializeSchema } = this.config;

    if (schemaValidation) {
      this.validateNames();
      if (!initializeSchema && !(await this.collectionExists())) {
        throw new SchemaValidationError(
          `${databaseName}.${collectionName}`,
          `Collection ${databaseName}.${collectionName} does not exist`,
        );
      }
      this.logger.info(`[mongodb] Collection ${databaseName}.${collectionName} validated`);
    }

    if (!initializeSchema) {
      return;
    }

    if (!(await this.collectionExists())) {
      await this.db().createCollection(collectionName);
      this.logger.info(`[mongodb] Created collection ${databaseName}.${collectionName}`);
    }

    const existing = await this.collection().listSearchIndexes(vectorIndexName).toArray();
    if (existing.length === 0) {
      await this.collection().createSearchIndex({
        name: vectorIndexName,
        type: 'vectorSearch',
        definition: searchIndexDefinition(this.config, dimensions),
      });
      this.logger.info(`[mongodb] Created vector search index ${vectorIndexName}`, { dimensions });
    }
  }

  async add(documents: readonly NewDocument[]): Promise<VectorDocument[]> {
    if (documents.length === 0) {
      return [];
    }

    const embedded = await embedDocuments(documents, this.embeddingModel, this.storeDimensions());
    const batches = this.batchingStrategy.batch(embedded);
    this.logger.debug(`[mongodb] Upserting ${embedded.length} documents in ${batches.length} batch(es)`);

    for (const batch of batches) {
      const operations: AnyBulkWriteOperation<{ _id: string }>[] = batch.map((doc) => ({
        replaceOne: {
          filter: { _id: doc.id },
          replacement: { content: doc.content, metadata: doc.metadata, [this.config.pathName]: doc.embedding },
          upsert: true,
        },
      }));
      try {
        await this.collection().bulkWrite(operations, { ordered: true });
      } catch (err) {
        this.logger.error(`[mongodb] Upsert of ${batch.length} documents failed: ${String(err)}`);
        throw err;
      }
    }

    return embedded;
  }

  async delete(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    const result = await this.collection().deleteMany({ _id: { $in: [...ids] } });
    this.logger.debug(`[mongodb] Deleted ${result.deletedCount} documents by id`);
  }

  async deleteByFilter(filterExpression: FilterInput): Promise<void> {
    const expression = toExpression(filterExpression);
    if (expression === null) {
      throw new VectorStoreError('deleteByFilter requires a non-empty filter expression');
    }
    const result = await this.collection().deleteMany(compileMongoFilter(expression));
    this.logger.debug(`[mongodb] Deleted ${result.deletedCount} documents by filter`);
  }

  async similaritySearch(request: SearchRequest | string): Promise<ScoredDocument[]> {
    const resolved = resolveSearchRequest(request);
    this.warnOnUnindexedKeys(resolved.filterExpression);

    const embedding = await this.embeddingModel.embed(resolved.query);
    assertDimensions(embedding, this.storeDimensions());

    const pipeline = searchPipeline(this.config, resolved, embedding);
    let rows: Document[];
    try {
      rows = await this.collection().aggregate(pipeline).toArray();
    } catch (err) {
      this.logger.error(`[mongodb] Similarity search failed: ${String(err)}`);
      throw err;
    }
    return rows.map(mapSearchResult);
  }

  getNativeClient(): MongoClient {
    return this.client;
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private db(): Db {
    return this.client.db(this.config.databaseName);
  }

  private collection(): Collection<{ _id: string }> {
    return this.db().collection<{ _id: string }>(this.config.collectionName);
  }

  private async collectionExists(): Promise<boolean> {
    const found = await this.db()
      .listCollections({ name: this.config.collectionName }, { nameOnly: true })
      .toArray();
    return found.length > 0;
  }

  private validateNames(): void {
    const { databaseName, collectionName } = this.config;
    if (INVALID_DATABASE_CHARS.test(databaseName)) {
      throw new SchemaValidationError(databaseName, `'${databaseName}' is not a valid database name`);
    }
    if (INVALID_COLLECTION_CHARS.test(collectionName) || collectionName.startsWith('system.')) {
      throw new SchemaValidationError(collectionName, `'${collectionName}' is not a valid collection name`);
    }
  }

  // $vectorSearch rejects filters on fields the index does not declare.
  private warnOnUnindexedKeys(expression: Expression | null): void {
    const declared = new Set(this.config.metadataFieldsToFilter);
    const unindexed = collectKeys(expression).filter((key) => !declared.has(key));
    if (unindexed.length > 0) {
      this.logger.warn(`[mongodb] Filter keys not declared in metadataFieldsToFilter: ${unindexed.join(', ')}`);
    }
  }

  private storeDimensions(): number {
    if (this.dimensions === undefined) {
      this.dimensions = resolveDimensions(this.config.dimensions, this.embeddingModel);
    }
    return this.dimensions;
  }
}
