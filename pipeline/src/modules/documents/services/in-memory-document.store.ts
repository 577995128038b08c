import { Logger } from '@nestjs/common';
import { InvalidTransitionError, NotFoundError } from '../../../common/errors/pipeline.errors';
import { documentIdFor } from '../document-id';
import { DocumentStore } from '../document-store.interface';
import {
  canTransition,
  ChunkRecord,
  CreateDocumentOptions,
  DocumentRecord,
  DocumentState,
  documentIdOfChunk,
  StateDetail,
} from '../document.types';

interface StoredDocument {
  record: DocumentRecord;
  payload: Buffer;
  chunks: Map<number, ChunkRecord>;
}

/**
 * Single-process document store. Every mutation completes synchronously
 * inside one call, so concurrent readers always see a whole record.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly logger = new Logger(InMemoryDocumentStore.name);
  private readonly documents = new Map<string, StoredDocument>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(payload: Buffer, options: CreateDocumentOptions): Promise<string> {
    const id = documentIdFor(payload);
    if (this.documents.has(id)) {
      this.logger.debug(`Document ${id} already stored, reusing it`);
      return id;
    }

    const timestamp = this.now().toISOString();
    this.documents.set(id, {
      record: {
        id,
        payloadRef: `memory:${id}`,
        contentType: options.contentType,
        fileName: options.fileName,
        state: DocumentState.Pending,
        chunkCount: 0,
        attempts: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      },
      payload: Buffer.from(payload),
      chunks: new Map(),
    });
    return id;
  }

  async get(id: string): Promise<DocumentRecord> {
    return { ...this.require(id).record };
  }

  async setState(id: string, state: DocumentState, detail: StateDetail = {}): Promise<DocumentRecord> {
    const stored = this.require(id);
    const current = stored.record;
    if (!canTransition(current.state, state)) {
      this.logger.warn(`Rejected transition of ${id} from ${current.state} to ${state}`);
      throw new InvalidTransitionError(id, current.state, state);
    }

    const next: DocumentRecord = {
      ...current,
      state,
      updatedAt: this.now().toISOString(),
      attempts: state === DocumentState.Processing ? current.attempts + 1 : current.attempts,
      chunkCount: detail.chunkCount ?? current.chunkCount,
      error: state === DocumentState.Failed ? detail.error ?? current.error : undefined,
    };
    stored.record = next;
    return { ...next };
  }

  async getPayload(id: string): Promise<Buffer> {
    return Buffer.from(this.require(id).payload);
  }

  async putChunks(documentId: string, chunks: ChunkRecord[]): Promise<void> {
    const stored = this.require(documentId);
    for (const chunk of chunks) {
      stored.chunks.set(chunk.ordinal, { ...chunk });
    }
  }

  async getChunks(ids: string[]): Promise<ChunkRecord[]> {
    const found: ChunkRecord[] = [];
    for (const id of ids) {
      const stored = this.documents.get(documentIdOfChunk(id));
      const chunk = stored && [...stored.chunks.values()].find((candidate) => candidate.id === id);
      if (chunk) {
        found.push({ ...chunk });
      }
    }
    return found;
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    return [...this.require(documentId).chunks.values()]
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((chunk) => ({ ...chunk }));
  }

  async delete(id: string): Promise<string[]> {
    const stored = this.require(id);
    this.documents.delete(id);
    return [...stored.chunks.values()].map((chunk) => chunk.id);
  }

  private require(id: string): StoredDocument {
    const stored = this.documents.get(id);
    if (!stored) {
      throw new NotFoundError('Document', id);
    }
    return stored;
  }
}
