export enum DocumentState {
  Pending = 'pending',
  Processing = 'processing',
  Ready = 'ready',
  Failed = 'failed',
}

/**
 * Allowed lifecycle moves. `failed -> processing` is a retry of a document
 * whose previous attempt hit an error.
 */
export const DOCUMENT_TRANSITIONS: Readonly<Record<DocumentState, readonly DocumentState[]>> = {
  [DocumentState.Pending]: [DocumentState.Processing],
  [DocumentState.Processing]: [DocumentState.Ready, DocumentState.Failed],
  [DocumentState.Ready]: [],
  [DocumentState.Failed]: [DocumentState.Processing],
};

export function canTransition(from: DocumentState, to: DocumentState): boolean {
  return DOCUMENT_TRANSITIONS[from].includes(to);
}

/** States a document may be in for a move to `to` to be allowed. */
export function allowedSources(to: DocumentState): DocumentState[] {
  return Object.values(DocumentState).filter((from) => canTransition(from, to));
}

export function isDocumentState(value: unknown): value is DocumentState {
  return Object.values(DocumentState).some((state) => state === value);
}

export interface DocumentRecord {
  id: string;
  payloadRef: string;
  contentType: string;
  fileName?: string;
  state: DocumentState;
  chunkCount: number;
  attempts: number;
  createdAt: string;
  updatedAt: string;
  error?: string;
}

export interface ChunkRecord {
  id: string;
  documentId: string;
  ordinal: number;
  text: string;
}

export interface CreateDocumentOptions {
  contentType: string;
  fileName?: string;
}

export interface StateDetail {
  error?: string;
  chunkCount?: number;
}

export function chunkId(documentId: string, ordinal: number): string {
  return `${documentId}:${ordinal}`;
}

/** Inverse of `chunkId`; document ids never contain ':'. */
export function documentIdOfChunk(id: string): string {
  const separator = id.lastIndexOf(':');
  return separator === -1 ? id : id.slice(0, separator);
}
