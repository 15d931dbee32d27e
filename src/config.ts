import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_MAX_DOCUMENT_BATCH_SIZE = 10_000;

const distanceTypeSchema = z.enum(['COSINE_DISTANCE', 'EUCLIDEAN_DISTANCE', 'NEGATIVE_INNER_PRODUCT']);

export type DistanceType = z.output<typeof distanceTypeSchema>;

export const pgVectorStoreConfigSchema = z
  .object({
    schemaName: z.string().min(1).default('public'),
    tableName: z.string().min(1).default('vector_store'),
    /** Falls back to the embedding model's dimensions when omitted. */
    dimensions: z.number().int().positive().optional(),
    distanceType: distanceTypeSchema.default('COSINE_DISTANCE'),
    indexType: z.enum(['NONE', 'IVFFLAT', 'HNSW']).default('HNSW'),
    initializeSchema: z.boolean().default(false),
    schemaValidation: z.boolean().default(false),
    removeExistingVectorStoreTable: z.boolean().default(false),
    maxDocumentBatchSize: z.number().int().positive().default(DEFAULT_MAX_DOCUMENT_BATCH_SIZE),
  })
  .strict();

export type PgVectorStoreConfig = Readonly<z.output<typeof pgVectorStoreConfigSchema>>;
export type PgVectorStoreConfigInput = z.input<typeof pgVectorStoreConfigSchema>;
export type PgIndexType = PgVectorStoreConfig['indexType'];

export const mongoDBAtlasStoreConfigSchema = z
  .object({
    databaseName: z.string().min(1),
    collectionName: z.string().min(1).default('vector_store'),
    vectorIndexName: z.string().min(1).default('vector_index'),
    /** Document field holding the embedding. */
    pathName: z.string().min(1).default('embedding'),
    /** Metadata keys declared as filter fields on the search index. */
    metadataFieldsToFilter: z.array(z.string().min(1)).default([]),
    numCandidatesMultiplier: z.number().int().positive().default(10),
    dimensions: z.number().int().positive().optional(),
    distanceType: distanceTypeSchema.default('COSINE_DISTANCE'),
    initializeSchema: z.boolean().default(false),
    schemaValidation: z.boolean().default(false),
    maxDocumentBatchSize: z.number().int().positive().default(DEFAULT_MAX_DOCUMENT_BATCH_SIZE),
  })
  .strict();

export type MongoDBAtlasStoreConfig = Readonly<z.output<typeof mongoDBAtlasStoreConfigSchema>>;
export type MongoDBAtlasStoreConfigInput = z.input<typeof mongoDBAtlasStoreConfigSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

export function parsePgVectorStoreConfig(input: PgVectorStoreConfigInput = {}): PgVectorStoreConfig {
  const result = pgVectorStoreConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid pgvector store configuration', describeIssues(result.error));
  }
  return Object.freeze(result.data);
}

export function parseMongoDBAtlasStoreConfig(input: MongoDBAtlasStoreConfigInput): MongoDBAtlasStoreConfig {
  const result = mongoDBAtlasStoreConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid MongoDB Atlas store configuration', describeIssues(result.error));
  }
  return Object.freeze(result.data);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const envBoolean = z.enum(['true', 'false']).transform((value) => value === 'true');
const envPositiveInt = z.coerce.number().int().positive();
const envList = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0),
);

const pgVectorEnvSchema = z.object({
  VECTOR_STORE_PGVECTOR_SCHEMA_NAME: z.string().optional(),
  VECTOR_STORE_PGVECTOR_TABLE_NAME: z.string().optional(),
  VECTOR_STORE_PGVECTOR_DIMENSIONS: envPositiveInt.optional(),
  VECTOR_STORE_PGVECTOR_DISTANCE_TYPE: distanceTypeSchema.optional(),
  VECTOR_STORE_PGVECTOR_INDEX_TYPE: z.enum(['NONE', 'IVFFLAT', 'HNSW']).optional(),
  VECTOR_STORE_PGVECTOR_INITIALIZE_SCHEMA: envBoolean.optional(),
  VECTOR_STORE_PGVECTOR_SCHEMA_VALIDATION: envBoolean.optional(),
  VECTOR_STORE_PGVECTOR_REMOVE_EXISTING_TABLE: envBoolean.optional(),
  VECTOR_STORE_PGVECTOR_MAX_DOCUMENT_BATCH_SIZE: envPositiveInt.optional(),
});

const mongoDBEnvSchema = z.object({
  VECTOR_STORE_MONGODB_DATABASE_NAME: z.string().optional(),
  VECTOR_STORE_MONGODB_COLLECTION_NAME: z.string().optional(),
  VECTOR_STORE_MONGODB_INDEX_NAME: z.string().optional(),
  VECTOR_STORE_MONGODB_PATH_NAME: z.string().optional(),
  VECTOR_STORE_MONGODB_METADATA_FIELDS_TO_FILTER: envList.optional(),
  VECTOR_STORE_MONGODB_NUM_CANDIDATES_MULTIPLIER: envPositiveInt.optional(),
  VECTOR_STORE_MONGODB_DIMENSIONS: envPositiveInt.optional(),
  VECTOR_STORE_MONGODB_DISTANCE_TYPE: distanceTypeSchema.optional(),
  VECTOR_STORE_MONGODB_INITIALIZE_SCHEMA: envBoolean.optional(),
  VECTOR_STORE_MONGODB_SCHEMA_VALIDATION: envBoolean.optional(),
  VECTOR_STORE_MONGODB_MAX_DOCUMENT_BATCH_SIZE: envPositiveInt.optional(),
});

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv, what: string): z.output<S> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${what} environment`, describeIssues(result.error));
  }
  return result.data;
}

/** Reads `VECTOR_STORE_PGVECTOR_*` variables; unset variables take the schema defaults. */
export function loadPgVectorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PgVectorStoreConfig {
  const vars = parseEnv(pgVectorEnvSchema, env, 'pgvector');
  return parsePgVectorStoreConfig({
    schemaName: vars.VECTOR_STORE_PGVECTOR_SCHEMA_NAME,
    tableName: vars.VECTOR_STORE_PGVECTOR_TABLE_NAME,
    dimensions: vars.VECTOR_STORE_PGVECTOR_DIMENSIONS,
    distanceType: vars.VECTOR_STORE_PGVECTOR_DISTANCE_TYPE,
    indexType: vars.VECTOR_STORE_PGVECTOR_INDEX_TYPE,
    initializeSchema: vars.VECTOR_STORE_PGVECTOR_INITIALIZE_SCHEMA,
    schemaValidation: vars.VECTOR_STORE_PGVECTOR_SCHEMA_VALIDATION,
    removeExistingVectorStoreTable: vars.VECTOR_STORE_PGVECTOR_REMOVE_EXISTING_TABLE,
    maxDocumentBatchSize: vars.VECTOR_STORE_PGVECTOR_MAX_DOCUMENT_BATCH_SIZE,
  });
}

/** Reads `VECTOR_STORE_MONGODB_*` variables. The database name is required. */
export function loadMongoDBConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MongoDBAtlasStoreConfig {
  const vars = parseEnv(mongoDBEnvSchema, env, 'MongoDB');
  const databaseName = vars.VECTOR_STORE_MONGODB_DATABASE_NAME;
  if (databaseName === undefined) {
    throw new ConfigurationError('VECTOR_STORE_MONGODB_DATABASE_NAME is not set');
  }
  return parseMongoDBAtlasStoreConfig({
    databaseName,
    collectionName: vars.VECTOR_STORE_MONGODB_COLLECTION_NAME,
    vectorIndexName: vars.VECTOR_STORE_MONGODB_INDEX_NAME,
    pathName: vars.VECTOR_STORE_MONGODB_PATH_NAME,
    metadataFieldsToFilter: vars.VECTOR_STORE_MONGODB_METADATA_FIELDS_TO_FILTER,
    numCandidatesMultiplier: vars.VECTOR_STORE_MONGODB_NUM_CANDIDATES_MULTIPLIER,
    dimensions: vars.VECTOR_STORE_MONGODB_DIMENSIONS,
    distanceType: vars.VECTOR_STORE_MONGODB_DISTANCE_TYPE,
    initializeSchema: vars.VECTOR_STORE_MONGODB_INITIALIZE_SCHEMA,
    schemaValidation: vars.VECTOR_STORE_MONGODB_SCHEMA_VALIDATION,
    maxDocumentBatchSize: vars.VECTOR_STORE_MONGODB_MAX_DOCUMENT_BATCH_SIZE,
  });
}
