import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { describeError, DocumentExtractionError } from '../../../common/errors/pipeline.errors';
import { PIPELINE_CONFIG, PipelineConfig } from '../../../config/app.config';
import { DOCUMENT_STORE, DocumentStore } from '../../documents/document-store.interface';
import { ChunkRecord, chunkId, DocumentRecord, DocumentState } from '../../documents/document.types';
import { ChunkingService } from '../../documents/services/chunking.service';
import { TextExtractionService } from '../../documents/services/text-extraction.service';
import { EmbeddingService } from '../../embeddings/services/embedding.service';
import { JobContext } from '../../queue/job.types';
import { TaskQueueService } from '../../queue/services/task-queue.service';
import { VECTOR_INDEX, VectorIndex } from '../../vector-index/vector-index.interface';

/**
 * Ingestion worker: extract → chunk → embed in batches → index → Ready.
 *
 * Runs under the per-document lock. Re-running it for the same document
 * rewrites the same chunks and vectors. Cancellation is checked before any
 * work and before each embedding batch. On failure the vectors written by
 * this attempt are removed before the document is marked Failed, and the
 * error is rethrown so the queue can decide on a retry.
 */
@Injectable()
export class IngestionProcessor implements OnModuleInit {
  private readonly logger = new Logger(IngestionProcessor.name);

  constructor(
    private readonly queue: TaskQueueService,
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    private readonly extraction: TextExtractionService,
    private readonly chunking: ChunkingService,
    private readonly embeddings: EmbeddingService,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  onModuleInit(): void {
    this.queue.registerHandler('ingest-document', (payload, context) =>
      this.process(payload.documentId, context),
    );
  }

  async process(documentId: string, context: JobContext): Promise<DocumentRecord> {
    let document = await this.store.get(documentId);
    if (document.state === DocumentState.Ready) {
      this.logger.debug(`Document ${documentId} is already ready`);
      return document;
    }
    if (document.state === DocumentState.Processing) {
      this.logger.warn(`Resuming document ${documentId} left in processing`);
    } else {
      document = await this.store.setState(documentId, DocumentState.Processing);
    }

    this.logger.log(`Ingesting document ${documentId} (attempt ${context.attempt})`);
    const startTime = Date.now();
    const written: string[] = [];

    try {
      // a job cancelled while queued fails here, leaving the document failed with the cause
      context.throwIfCancelled();
      const payload = await this.store.getPayload(documentId);
      const text = await this.extraction.extract(payload, document.contentType);
      const pieces = this.chunking.chunk(text);
      if (pieces.length === 0) {
        throw new DocumentExtractionError(`Document ${documentId} has no extractable text`);
      }

      const chunks: ChunkRecord[] = pieces.map((piece) => ({
        id: chunkId(documentId, piece.ordinal),
        documentId,
        ordinal: piece.ordinal,
        text: piece.text,
      }));
      await this.store.putChunks(documentId, chunks);

      const batchSize = this.config.embedding.batchSize;
      for (let start = 0; start < chunks.length; start += batchSize) {
        context.throwIfCancelled();
        const batch = chunks.slice(start, start + batchSize);
        const vectors = await this.embeddings.embed(batch.map((chunk) => chunk.text));
        for (const [position, chunk] of batch.entries()) {
          await this.index.upsert(chunk.id, vectors[position]);
          written.push(chunk.id);
        }
      }

      const ready = await this.store.setState(documentId, DocumentState.Ready, { chunkCount: chunks.length });
      this.logger.log(`Document ${documentId} ready with ${chunks.length} chunks in ${Date.now() - startTime}ms`);
      return ready;
    } catch (error) {
      await this.discardVectors(documentId, written);
      await this.markFailed(documentId, describeError(error));
      throw error;
    }
  }

  private async discardVectors(documentId: string, chunkIds: string[]): Promise<void> {
    for (const id of chunkIds) {
      try {
        await this.index.delete(id);
      } catch (error) {
        this.logger.error(`Could not remove vector ${id} of document ${documentId}: ${describeError(error)}`);
      }
    }
  }

  private async markFailed(documentId: string, message: string): Promise<void> {
    try {
      await this.store.setState(documentId, DocumentState.Failed, { error: message });
    } catch (error) {
      this.logger.warn(`Could not mark document ${documentId} failed: ${describeError(error)}`);
    }
  }
}
