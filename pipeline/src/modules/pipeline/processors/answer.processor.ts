import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { NotFoundError } from '../../../common/errors/pipeline.errors';
import { PIPELINE_CONFIG, PipelineConfig } from '../../../config/app.config';
import { DOCUMENT_STORE, DocumentStore } from '../../documents/document-store.interface';
import { ChunkRecord, DocumentState } from '../../documents/document.types';
import { EmbeddingService } from '../../embeddings/services/embedding.service';
import { LANGUAGE_MODEL, LanguageModel } from '../../llm/language-model.interface';
import { noFactsAnswer } from '../../llm/prompt';
import { AnswerQuestionPayload, JobContext } from '../../queue/job.types';
import { TaskQueueService } from '../../queue/services/task-queue.service';
import { RATE_LIMITER, RateLimiter } from '../../rate-limit/token-bucket.rate-limiter';
import { VECTOR_INDEX, VectorIndex } from '../../vector-index/vector-index.interface';
import { AnswerOutcome, RetrievalOptions } from '../pipeline.types';
import { AnswerCacheService } from '../services/answer-cache.service';

@Injectable()
export class AnswerProcessor implements OnModuleInit {
  private readonly logger = new Logger(AnswerProcessor.name);

  constructor(
    private readonly queue: TaskQueueService,
    private readonly answerCache: AnswerCacheService,
    private readonly embeddings: EmbeddingService,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(RATE_LIMITER) private readonly rateLimiter: RateLimiter,
    @Inject(LANGUAGE_MODEL) private readonly languageModel: LanguageModel,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  onModuleInit(): void {
    this.queue.registerHandler('answer-question', (payload, context) => this.process(payload, context));
  }

  async process(payload: AnswerQuestionPayload, context: JobContext): Promise<AnswerOutcome> {
    const { question, fingerprint, requestId } = payload;
    context.throwIfCancelled();

    // an earlier job for the same fingerprint may have filled the cache
    const cached = await this.answerCache.lookup(fingerprint);
    if (cached) {
      this.logger.debug(`[${requestId}] served from cache inside job`);
      return { answer: cached.answer, evidence: cached.evidence, cached: true };
    }

    const evidence = await this.retrieve(question, requestId, {
      topK: payload.topK ?? this.config.answer.topK,
      minSimilarity: payload.minSimilarity ?? this.config.answer.minSimilarity,
    });
    if (evidence.length === 0) {
      this.logger.log(`[${requestId}] no relevant facts; skipping the language model`);
      return { answer: noFactsAnswer(question), evidence: [], cached: false };
    }

    const { acquireTimeoutMs } = this.config.rateLimit;
    await this.rateLimiter.acquire(acquireTimeoutMs);
    context.throwIfCancelled();

    const startTime = Date.now();
    const answer = await this.languageModel.complete(
      question,
      evidence.map((chunk) => chunk.text),
    );
    const evidenceIds = evidence.map((chunk) => chunk.id);
    this.logger.log(
      `[${requestId}] answered from ${evidenceIds.length} chunks in ${Date.now() - startTime}ms`,
    );

    await this.answerCache.remember(fingerprint, question, answer, evidenceIds);
    return { answer, evidence: evidenceIds, cached: false };
  }

  /**
   * Top-K chunks above the similarity floor whose document is Ready, in
   * index order.
   */
  private async retrieve(
    question: string,
    requestId: string,
    { topK, minSimilarity }: RetrievalOptions,
  ): Promise<ChunkRecord[]> {
    const [vector] = await this.embeddings.embed([question]);
    const hits = await this.index.query(vector, topK);
    const relevant = hits.filter((hit) => hit.score >= minSimilarity);
    this.logger.debug(`[${requestId}] ${relevant.length}/${hits.length} hits above ${minSimilarity}`);

    const chunks = await this.store.getChunks(relevant.map((hit) => hit.chunkId));
    const readiness = new Map<string, boolean>();
    for (const chunk of chunks) {
      if (!readiness.has(chunk.documentId)) {
        readiness.set(chunk.documentId, await this.isReady(chunk.documentId));
      }
    }
    return chunks.filter((chunk) => readiness.get(chunk.documentId) === true);
  }

  private async isReady(documentId: string): Promise<boolean> {
    try {
      const document = await this.store.get(documentId);
      return document.state === DocumentState.Ready;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }
}
