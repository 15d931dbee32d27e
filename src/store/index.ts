export { FixedSizeBatchingStrategy } from './batching.js';
export { createDocument, DEFAULT_TOP_K } from './documents.js';
export { PgVectorStore } from './pgvector/pgvector-store.js';
export type { PgVectorStoreOptions } from './pgvector/pgvector-store.js';
export { MongoDBAtlasVectorStore } from './mongodb/mongodb-store.js';
export type { MongoDBAtlasVectorStoreOptions } from './mongodb/mongodb-store.js';
