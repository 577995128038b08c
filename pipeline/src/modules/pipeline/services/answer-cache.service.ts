import { Inject, Injectable, Logger } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../../../config/app.config';
import { DOCUMENT_STORE, DocumentStore } from '../../documents/document-store.interface';
import { CacheEntry, RESPONSE_CACHE, ResponseCache } from '../../cache/response-cache.interface';

/**
 * Response-cache policy for answers. A cached answer is served only while
 * every chunk it cites still exists; an entry citing a deleted document is
 * dropped on read.
 */
@Injectable()
export class AnswerCacheService {
  private readonly logger = new Logger(AnswerCacheService.name);

  constructor(
    @Inject(RESPONSE_CACHE) private readonly cache: ResponseCache,
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async lookup(fingerprint: string): Promise<CacheEntry | null> {
    const entry = await this.cache.get(fingerprint);
    if (!entry) {
      return null;
    }

    const cited = await this.store.getChunks(entry.evidence);
    if (cited.length !== entry.evidence.length) {
      this.logger.debug(`Dropping cached answer ${fingerprint.slice(0, 12)}: cited chunks are gone`);
      await this.cache.delete(fingerprint);
      return null;
    }
    return entry;
  }

  async remember(fingerprint: string, question: string, answer: string, evidence: string[]): Promise<void> {
    const ttlSeconds = this.config.answer.cacheTtlSeconds;
    const createdAt = new Date();
    await this.cache.put(
      fingerprint,
      {
        question,
        answer,
        evidence,
        createdAt: createdAt.toISOString(),
        expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1000).toISOString(),
      },
      ttlSeconds,
    );
  }
}
