import type { Document } from 'mongodb';
import type { DistanceType, MongoDBAtlasStoreConfig } from '../../config.js';
import { compileMongoFilter } from '../../filter/compile-mongo.js';
import type { ResolvedSearchRequest } from '../documents.js';

export const ATLAS_SIMILARITY: Readonly<Record<DistanceType, string>> = {
  COSINE_DISTANCE: 'cosine',
  EUCLIDEAN_DISTANCE: 'euclidean',
  NEGATIVE_INNER_PRODUCT: 'dotProduct',
};

/**
 * Atlas `vectorSearch` index definition: the embedding field plus one filter
 * field per configured metadata key. `$vectorSearch` only pre-filters on
 * fields declared here.
 */
export function searchIndexDefinition(config: MongoDBAtlasStoreConfig, dimensions: number): Document {
  return {
    fields: [
      {
        type: 'vector',
        path: config.pathName,
        numDimensions: dimensions,
        similarity: ATLAS_SIMILARITY[config.distanceType],
      },
      ...config.metadataFieldsToFilter.map((key) => ({ type: 'filter', path: `metadata.${key}` })),
    ],
  };
}

export function searchPipeline(
  config: MongoDBAtlasStoreConfig,
  request: ResolvedSearchRequest,
  embedding: readonly number[],
): Document[] {
  const vectorSearch: Document = {
    index: config.vectorIndexName,
    path: config.pathName,
    queryVector: [...embedding],
    numCandidates: request.topK * config.numCandidatesMultiplier,
    limit: request.topK,
  };

  if (request.filterExpression !== null) {
    vectorSearch['filter'] = compileMongoFilter(request.filterExpression);
  }

  const pipeline: Document[] = [
    { $vectorSearch: vectorSearch },
    { $project: { _id: 1, content: 1, metadata: 1, score: { $meta: 'vectorSearchScore' } } },
  ];

  if (request.similarityThreshold !== undefined) {
    pipeline.push({ $match: { score: { $gte: request.similarityThreshold } } });
  }

  return pipeline;
}
