export const EMBEDDING_BACKEND = Symbol('EMBEDDING_BACKEND');

/**
 * A source of fixed-dimension text embeddings. One backend is chosen at
 * startup and used for every vector in an index, so all vectors share a
 * dimension and a semantic space.
 */
export interface EmbeddingBackend {
  readonly name: string;
  dimension(): number;
  /** One vector per input, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}
