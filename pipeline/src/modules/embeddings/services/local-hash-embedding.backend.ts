import { l2Normalize } from '../../../common/helpers/vector-math';
import { EmbeddingBackend } from '../embedding-backend.interface';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * In-process embedding model based on the hashing trick: every word token
 * is hashed into one of `dimension` buckets with a hash-derived sign, and
 * the resulting bag-of-words vector is L2-normalized. Deterministic and
 * needs no network, so texts sharing vocabulary land close together.
 */
export class LocalHashEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'local';

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Embedding dimension must be a positive integer, got ${size}`);
    }
  }

  dimension(): number {
    return this.size;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.size).fill(0);
    const tokens = text.normalize('NFKC').toLowerCase().match(TOKEN_PATTERN) ?? [];
    for (const token of tokens) {
      const hash = fnv1a(token);
      const bucket = (hash & 0x7fffffff) % this.size;
      vector[bucket] += hash >>> 31 === 1 ? -1 : 1;
    }
    return l2Normalize(vector);
  }
}
