import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError, EmbeddingUnavailableError } from '../../../common/errors/pipeline.errors';
import { EMBEDDING_BACKEND, EmbeddingBackend } from '../embedding-backend.interface';

/**
 * Front door to the configured embedding backend. Checks that every reply
 * has one finite vector per input at the backend's dimension; anything
 * else is reported as EmbeddingUnavailableError and left to the caller's
 * retry policy.
 */
@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);

  constructor(@Inject(EMBEDDING_BACKEND) private readonly backend: EmbeddingBackend) {
    this.logger.log(`Using ${backend.name} embeddings (${backend.dimension()} dimensions)`);
  }

  dimension(): number {
    return this.backend.dimension();
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const startTime = Date.now();
    let vectors: number[][];
    try {
      vectors = await this.backend.embed(texts);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      throw new EmbeddingUnavailableError(
        `Embedding backend ${this.backend.name} failed: ${describeError(error)}`,
        error,
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `Embedding backend ${this.backend.name} returned ${vectors.length} vectors for ${texts.length} texts`,
      );
    }
    const expected = this.backend.dimension();
    for (const vector of vectors) {
      if (vector.length !== expected || !vector.every((value) => Number.isFinite(value))) {
        throw new EmbeddingUnavailableError(
          `Embedding backend ${this.backend.name} returned a malformed vector (expected ${expected} finite values)`,
        );
      }
    }

    this.logger.debug(`Embedded ${texts.length} texts in ${Date.now() - startTime}ms`);
    return vectors;
  }
}
