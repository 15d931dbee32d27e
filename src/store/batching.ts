import type { BatchingStrategy, VectorDocument } from '../types.js';

/**
 * Splits documents into consecutive batches of at most `maxBatchSize`,
 * preserving input order.
 */
export class FixedSizeBatchingStrategy implements BatchingStrategy {
  constructor(readonly maxBatchSize: number) {
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
      throw new RangeError(`maxBatchSize must be a positive integer, got ${maxBatchSize}`);
    }
  }

  batch<T extends VectorDocument>(documents: readonly T[]): T[][] {
    const batches: T[][] = [];
    for (let start = 0; start < documents.length; start += this.maxBatchSize) {
      batches.push(documents.slice(start, start + this.maxBatchSize));
    }
    return batches;
  }
}
