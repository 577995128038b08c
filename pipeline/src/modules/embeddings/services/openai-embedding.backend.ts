/**
 * OpenAI Embedding Backend
 *
 * Generates embeddings through an OpenAI-compatible `/embeddings` endpoint
 * (OpenAI itself, or any provider exposing the same API via `baseURL`).
 *
 * Responsibilities:
 * - Send a whole batch of texts in one request
 * - Put the returned vectors back in input order (by `index`)
 * - L2-normalize so cosine similarity and inner product agree
 * - Surface every failure as EmbeddingUnavailableError; retries belong to
 *   the task queue, so the client's own retries default to 0
 */

import { Logger } from '@nestjs/common';
import { describeError, EmbeddingUnavailableError } from '../../../common/errors/pipeline.errors';
import { l2Normalize } from '../../../common/helpers/vector-math';
import { EmbeddingBackend } from '../embedding-backend.interface';

/** The slice of the OpenAI SDK client this backend calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension: number;
}

export class OpenAIEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'openai';
  private readonly logger = new Logger(OpenAIEmbeddingBackend.name);

  constructor(
    private readonly client: EmbeddingsClient,
    private readonly options: OpenAIEmbeddingOptions,
  ) {}

  dimension(): number {
    return this.options.dimension;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const input = texts.map((text) => this.normalizeText(text));
    this.logger.debug(`Embedding ${input.length} texts with ${this.options.model}`);

    let response: Awaited<ReturnType<EmbeddingsClient['embeddings']['create']>>;
    try {
      response = await this.client.embeddings.create({
        model: this.options.model,
        input,
        // only the text-embedding-3 family accepts a custom size
        ...(this.options.model.startsWith('text-embedding-3') ? { dimensions: this.options.dimension } : {}),
      });
    } catch (error) {
      this.logger.warn(`Embedding request failed: ${describeError(error)}`);
      throw new EmbeddingUnavailableError(`Embedding backend unavailable: ${describeError(error)}`, error);
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return ordered.map((item) => l2Normalize(item.embedding));
  }

  private normalizeText(text: string): string {
    // the endpoint rejects empty strings
    const collapsed = text.trim().replace(/\s+/g, ' ');
    return collapsed.length > 0 ? collapsed : ' ';
  }
}
