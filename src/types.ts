import type { FilterInput } from './filter/compiler.js';

export interface VectorDocument {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  embedding?: number[];
}

export interface NewDocument {
  id?: string;
  content: string;
  metadata?: Record<string, unknown>;
  embedding?: number[];
}

export interface ScoredDocument {
  document: VectorDocument;
  score: number;
}

export interface SearchRequest {
  query: string;
  /** Defaults to 4. */
  topK?: number;
  /** Minimum similarity in [0, 1]; no threshold is applied when omitted. */
  similarityThreshold?: number;
  /** A filter tree or filter text; text is parsed before the query is issued. */
  filterExpression?: FilterInput;
}

export interface EmbeddingModel {
  embed(text: string): Promise<number[]>;
  embedAll(texts: string[]): Promise<number[][]>;
  dimensions(): number;
}

export interface BatchingStrategy {
  batch<T extends VectorDocument>(documents: readonly T[]): T[][];
}

/**
 * Similarity store over embedded documents. `TClient` is the driver handle
 * returned by getNativeClient() for work the abstraction does not cover.
 */
export interface VectorStore<TClient = unknown> {
  readonly name: string;
  initialize(): Promise<void>;
  add(documents: readonly NewDocument[]): Promise<VectorDocument[]>;
  delete(ids: readonly string[]): Promise<void>;
  deleteByFilter(filterExpression: FilterInput): Promise<void>;
  similaritySearch(request: SearchRequest | string): Promise<ScoredDocument[]>;
  getNativeClient(): TClient | null;
  close(): Promise<void>;
}
