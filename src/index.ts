export * from './filter/index.js';
export * from './store/index.js';
export type {
  VectorDocument,
  NewDocument,
  ScoredDocument,
  SearchRequest,
  EmbeddingModel,
  BatchingStrategy,
  VectorStore,
} from './types.js';
export {
  parsePgVectorStoreConfig,
  parseMongoDBAtlasStoreConfig,
  loadPgVectorConfigFromEnv,
  loadMongoDBConfigFromEnv,
  DEFAULT_MAX_DOCUMENT_BATCH_SIZE,
} from './config.js';
export type {
  DistanceType,
  PgIndexType,
  PgVectorStoreConfig,
  PgVectorStoreConfigInput,
  MongoDBAtlasStoreConfig,
  MongoDBAtlasStoreConfigInput,
} from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export {
  FilterParseError,
  FilterValidationError,
  DimensionMismatchError,
  SchemaValidationError,
  ConfigurationError,
  VectorStoreError,
} from './errors.js';
