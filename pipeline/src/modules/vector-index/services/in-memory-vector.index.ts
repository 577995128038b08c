import { Logger } from '@nestjs/common';
import { VectorDimensionError } from '../../../common/errors/pipeline.errors';
import { cosineSimilarity } from '../../../common/helpers/vector-math';
import { compareScored, ScoredChunk, VectorIndex } from '../vector-index.interface';

/**
 * Exact (brute-force) cosine index held in process memory. The dimension
 * is fixed by the configured embedding backend, or by the first upsert.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly logger = new Logger(InMemoryVectorIndex.name);
  private readonly vectors = new Map<string, number[]>();

  constructor(private dimension?: number) {}

  async upsert(chunkId: string, vector: number[]): Promise<void> {
    this.checkDimension(vector);
    this.dimension ??= vector.length;
    this.vectors.set(chunkId, [...vector]);
  }

  async query(vector: number[], k: number): Promise<ScoredChunk[]> {
    if (k <= 0 || this.vectors.size === 0) {
      return [];
    }
    this.checkDimension(vector);

    const scored: ScoredChunk[] = [];
    for (const [chunkId, stored] of this.vectors) {
      scored.push({ chunkId, score: cosineSimilarity(vector, stored) });
    }
    scored.sort(compareScored);

    const results = scored.slice(0, k);
    this.logger.debug(`Matched ${results.length}/${this.vectors.size} vectors`);
    return results;
  }

  async delete(chunkId: string): Promise<boolean> {
    return this.vectors.delete(chunkId);
  }

  async size(): Promise<number> {
    return this.vectors.size;
  }

  private checkDimension(vector: number[]): void {
    if (this.dimension !== undefined && vector.length !== this.dimension) {
      throw new VectorDimensionError(this.dimension, vector.length);
    }
  }
}
