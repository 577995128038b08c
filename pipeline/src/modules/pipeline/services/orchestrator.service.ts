import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { randomUUID } from 'node:crypto';
import {
  AnswerFailedError,
  AnswerTimeoutError,
  describeError,
  NotFoundError,
} from '../../../common/errors/pipeline.errors';
import { PIPELINE_CONFIG, PipelineConfig } from '../../../config/app.config';
import { fingerprint } from '../../cache/fingerprint';
import { DOCUMENT_STORE, DocumentStore } from '../../documents/document-store.interface';
import { CreateDocumentOptions, DocumentRecord, DocumentState } from '../../documents/document.types';
import { documentLockKey, isTerminal, JobRecord, JobState } from '../../queue/job.types';
import { TaskQueueService } from '../../queue/services/task-queue.service';
import { VECTOR_INDEX, VectorIndex } from '../../vector-index/vector-index.interface';
import { AskQuestionDto } from '../dto/ask-question.dto';
import {
  answerJobId,
  answerKey,
  AnswerOptions,
  AnswerOutcome,
  AnswerResult,
  ingestJobId,
  isAnswerOutcome,
  RetrievalOptions,
} from '../pipeline.types';
import { AnswerCacheService } from './answer-cache.service';

/**
 * Entry point for collaborators. Uploads become ingestion jobs; questions
 * are answered from the cache or by an answer job, with concurrent callers
 * asking the same question sharing one computation.
 */
@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);
  private readonly inFlight = new Map<string, Promise<AnswerOutcome>>();

  constructor(
    private readonly queue: TaskQueueService,
    private readonly answerCache: AnswerCacheService,
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /** Stores the payload and schedules ingestion; returns without waiting for it. */
  async ingest(payload: Buffer, options: CreateDocumentOptions): Promise<string> {
    if (payload.length === 0) {
      throw new BadRequestException('Document payload is empty');
    }

    const documentId = await this.store.create(payload, options);
    const document = await this.store.get(documentId);
    if (document.state === DocumentState.Ready) {
      this.logger.log(`Document ${documentId} already ingested`);
      return documentId;
    }

    await this.queue.enqueue(
      { kind: 'ingest-document', documentId },
      { jobId: ingestJobId(documentId) },
    );
    this.logger.log(`Queued ingestion of ${options.fileName ?? documentId} (${options.contentType})`);
    return documentId;
  }

  /**
   * Answers from the cache, an in-flight computation or a new answer job.
   * The whole call, cache lookup included, is bounded by the answer
   * deadline; the job itself keeps running past it.
   */
  async answer(question: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const dto = this.validateQuestion(question, options);
    const requestId = randomUUID();
    const defaults: RetrievalOptions = {
      topK: this.config.answer.topK,
      minSimilarity: this.config.answer.minSimilarity,
    };
    const retrieval: RetrievalOptions = {
      topK: dto.maxResponses ?? defaults.topK,
      minSimilarity: dto.similarityLimit ?? defaults.minSimilarity,
    };
    const key = answerKey(fingerprint(dto.question), retrieval, defaults);
    const { deadlineMs } = this.config.answer;

    try {
      const outcome = await this.withDeadline(
        this.resolve(dto.question, key, retrieval, requestId),
        deadlineMs,
      );
      return this.toResult(requestId, question, outcome);
    } catch (error) {
      if (error instanceof AnswerTimeoutError && this.inFlight.delete(key)) {
        // later callers wait on the job afresh instead of on this computation
        this.logger.warn(`[${requestId}] answer ${key.slice(0, 12)} missed its ${deadlineMs}ms deadline`);
      }
      throw error;
    }
  }

  getDocument(id: string): Promise<DocumentRecord> {
    return this.store.get(id);
  }

  getJob(id: string): JobRecord {
    const job = this.queue.getJob(id);
    if (!job) {
      throw new NotFoundError('Job', id);
    }
    return job;
  }

  cancelIngestion(documentId: string): JobRecord {
    return this.queue.cancel(ingestJobId(documentId));
  }

  /**
   * Cancels any pending ingestion, then removes the document's vectors,
   * chunks and record under the document lock.
   * @returns ids of the removed chunks
   */
  async deleteDocument(documentId: string): Promise<string[]> {
    await this.store.get(documentId);

    const job = this.queue.getJob(ingestJobId(documentId));
    if (job && !isTerminal(job.state)) {
      this.queue.cancel(job.id);
    }

    return this.queue.runExclusive(documentLockKey(documentId), async () => {
      const chunks = await this.store.listChunks(documentId);
      for (const chunk of chunks) {
        await this.index.delete(chunk.id);
      }
      const removed = await this.store.delete(documentId);
      this.logger.log(`Deleted document ${documentId} and ${removed.length} chunks`);
      return removed;
    });
  }

  private async resolve(
    question: string,
    key: string,
    retrieval: RetrievalOptions,
    requestId: string,
  ): Promise<AnswerOutcome> {
    const hit = await this.answerCache.lookup(key);
    if (hit) {
      this.logger.debug(`[${requestId}] cache hit`);
      return { answer: hit.answer, evidence: hit.evidence, cached: true };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger.debug(`[${requestId}] joining in-flight answer`);
      return pending;
    }
    return this.track(key, this.compute(question, key, retrieval, requestId));
  }

  private validateQuestion(question: string, options: AnswerOptions): AskQuestionDto {
    const dto = plainToInstance(AskQuestionDto, { ...options, question });
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new BadRequestException(messages.join('; '));
    }
    return dto;
  }

  private track(key: string, work: Promise<AnswerOutcome>): Promise<AnswerOutcome> {
    const tracked: Promise<AnswerOutcome> = work.finally(() => {
      if (this.inFlight.get(key) === tracked) {
        this.inFlight.delete(key);
      }
    });
    // callers past their deadline no longer listen
    tracked.catch((error: unknown) => {
      this.logger.debug(`Answer computation ${key.slice(0, 12)} ended with: ${describeError(error)}`);
    });
    this.inFlight.set(key, tracked);
    return tracked;
  }

  private async compute(
    question: string,
    key: string,
    retrieval: RetrievalOptions,
    requestId: string,
  ): Promise<AnswerOutcome> {
    const job = await this.queue.enqueue(
      {
        kind: 'answer-question',
        question,
        requestId,
        fingerprint: key,
        topK: retrieval.topK,
        minSimilarity: retrieval.minSimilarity,
      },
      { jobId: answerJobId(key) },
    );
    const settled = await this.queue.waitFor(job.id);

    if (settled.state === JobState.Failed) {
      this.logger.error(`[${requestId}] answer job ${settled.id} failed: ${settled.error ?? 'unknown error'}`);
      throw new AnswerFailedError(settled.error);
    }
    if (!isAnswerOutcome(settled.result)) {
      this.logger.error(`[${requestId}] answer job ${settled.id} produced no answer`);
      throw new AnswerFailedError();
    }
    return settled.result;
  }

  private withDeadline<T>(work: Promise<T>, deadlineMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new AnswerTimeoutError(deadlineMs)), deadlineMs);
    });
    return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
  }

  private toResult(requestId: string, question: string, outcome: AnswerOutcome): AnswerResult {
    return {
      requestId,
      question,
      answer: outcome.answer,
      evidence: [...outcome.evidence],
      cached: outcome.cached,
      answeredAt: new Date().toISOString(),
    };
  }
}
