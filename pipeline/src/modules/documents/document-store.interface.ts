import {
  ChunkRecord,
  CreateDocumentOptions,
  DocumentRecord,
  DocumentState,
  StateDetail,
} from './document.types';

export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');

/**
 * Durable record of uploaded documents, their payloads and chunks.
 *
 * A state change is visible to every reader once `setState` resolves, and a
 * reader never sees a half-applied change.
 */
export interface DocumentStore {
  /** Stores the payload and returns its content-addressed id. */
  create(payload: Buffer, options: CreateDocumentOptions): Promise<string>;

  /** @throws NotFoundError */
  get(id: string): Promise<DocumentRecord>;

  /**
   * @throws NotFoundError when the id is unknown
   * @throws InvalidTransitionError when the move is not in the lifecycle graph
   */
  setState(id: string, state: DocumentState, detail?: StateDetail): Promise<DocumentRecord>;

  /** @throws NotFoundError */
  getPayload(id: string): Promise<Buffer>;

  /** Writes the document's chunks; rewriting identical chunks is a no-op. */
  putChunks(documentId: string, chunks: ChunkRecord[]): Promise<void>;

  /** Looks chunks up by id; unknown ids are left out of the result. */
  getChunks(ids: string[]): Promise<ChunkRecord[]>;

  listChunks(documentId: string): Promise<ChunkRecord[]>;

  /**
   * Removes the document, its payload and chunks.
   * @returns ids of the chunks that were removed
   * @throws NotFoundError
   */
  delete(id: string): Promise<string[]>;
}
