export const VECTOR_INDEX = Symbol('VECTOR_INDEX');

export interface ScoredChunk {
  chunkId: string;
  /** Cosine similarity; 1 for an identical direction. */
  score: number;
}

/**
 * Nearest-neighbour store for chunk embeddings. Results are ordered by
 * descending score, ties by ascending chunk id, so identical index state
 * and query always give the same answer.
 */
export interface VectorIndex {
  upsert(chunkId: string, vector: number[]): Promise<void>;
  query(vector: number[], k: number): Promise<ScoredChunk[]>;
  /** @returns whether an entry was removed */
  delete(chunkId: string): Promise<boolean>;
  size(): Promise<number>;
}

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.chunkId === b.chunkId) {
    return 0;
  }
  return a.chunkId < b.chunkId ? -1 : 1;
}
