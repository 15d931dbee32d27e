import { v4 as uuidv4 } from 'uuid';
import { DimensionMismatchError, VectorStoreError } from '../errors.js';
import { toExpression } from '../filter/compiler.js';
import type { Expression } from '../filter/types.js';
import type { EmbeddingModel, NewDocument, SearchRequest, VectorDocument } from '../types.js';

export const DEFAULT_TOP_K = 4;

export interface ResolvedSearchRequest {
  query: string;
  topK: number;
  similarityThreshold: number | undefined;
  filterExpression: Expression | null;
}

export function createDocument(input: NewDocument): VectorDocument {
  return {
    id: input.id ?? uuidv4(),
    content: input.content,
    metadata: input.metadata ?? {},
    ...(input.embedding !== undefined ? { embedding: input.embedding } : {}),
  };
}

/**
 * The store dimension is the configured one when given, otherwise the
 * embedding model's. A configured value that disagrees with the model is
 * rejected up front rather than at the first insert.
 */
export function resolveDimensions(configured: number | undefined, model: EmbeddingModel): number {
  const modelDimensions = model.dimensions();
  if (configured !== undefined && configured !== modelDimensions) {
    throw new DimensionMismatchError(
      configured,
      modelDimensions,
      `Configured dimensions ${configured} do not match embedding model dimensions ${modelDimensions}`,
    );
  }
  return configured ?? modelDimensions;
}

export function assertDimensions(embedding: readonly number[], dimensions: number): void {
  if (embedding.length !== dimensions) {
    throw new DimensionMismatchError(dimensions, embedding.length);
  }
}

// A multi-row upsert cannot touch the same row twice; the last document with an id wins.
function dedupeById(documents: readonly VectorDocument[]): VectorDocument[] {
  const byId = new Map<string, VectorDocument>();
  for (const doc of documents) {
    byId.delete(doc.id);
    byId.set(doc.id, doc);
  }
  return [...byId.values()];
}

/**
 * Assigns ids and embeddings. Documents that already carry an embedding are
 * not re-embedded; every embedding is checked against the store dimension.
 * When several inputs share an id only the last is kept, at its position.
 */
export async function embedDocuments(
  inputs: readonly NewDocument[],
  model: EmbeddingModel,
  dimensions: number,
): Promise<Array<VectorDocument & { embedding: number[] }>> {
  const documents = dedupeById(inputs.map(createDocument));
  const pending = documents.filter((doc) => doc.embedding === undefined);

  if (pending.length > 0) {
    const vectors = await model.embedAll(pending.map((doc) => doc.content));
    if (vectors.length !== pending.length) {
      throw new VectorStoreError(
        `Embedding model returned ${vectors.length} embeddings for ${pending.length} documents`,
      );
    }
    pending.forEach((doc, i) => {
      doc.embedding = vectors[i];
    });
  }

  return documents.map((doc) => {
    const embedding = doc.embedding ?? [];
    assertDimensions(embedding, dimensions);
    return { ...doc, embedding };
  });
}

export function resolveSearchRequest(request: SearchRequest | string): ResolvedSearchRequest {
  const req: SearchRequest = typeof request === 'string' ? { query: request } : request;
  const topK = req.topK ?? DEFAULT_TOP_K;

  if (!Number.isInteger(topK) || topK < 1) {
    throw new VectorStoreError(`topK must be a positive integer, got ${topK}`);
  }

  const threshold = req.similarityThreshold;
  if (threshold !== undefined && !(threshold >= 0 && threshold <= 1)) {
    throw new VectorStoreError(`similarityThreshold must be within [0, 1], got ${threshold}`);
  }

  return {
    query: req.query,
    topK,
    similarityThreshold: threshold,
    filterExpression: toExpression(req.filterExpression),
  };
}

