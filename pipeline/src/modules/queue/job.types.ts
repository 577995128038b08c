export type JobClass = 'ingestion' | 'answer';

export const JOB_CLASSES: readonly JobClass[] = ['ingestion', 'answer'];

export interface IngestDocumentPayload {
  kind: 'ingest-document';
  documentId: string;
}

export interface AnswerQuestionPayload {
  kind: 'answer-question';
  question: string;
  requestId: string;
  /** Cache and lock key of the answer. */
  fingerprint: string;
  /** Retrieval overrides; the configured values apply when absent. */
  topK?: number;
  minSimilarity?: number;
}

export type JobPayload = IngestDocumentPayload | AnswerQuestionPayload;
export type JobKind = JobPayload['kind'];
export type PayloadOf<K extends JobKind> = Extract<JobPayload, { kind: K }>;

export enum JobState {
  Queued = 'queued',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

export interface JobRecord {
  id: string;
  jobClass: JobClass;
  payload: JobPayload;
  state: JobState;
  /** Attempts started so far. */
  attempts: number;
  maxAttempts: number;
  /** Jobs sharing a lock key never run at the same time. */
  lockKey?: string;
  cancelled: boolean;
  error?: string;
  result?: unknown;
  createdAt: string;
  updatedAt: string;
}

export interface JobContext {
  jobId: string;
  attempt: number;
  isCancelled(): boolean;
  /** Throws JobCancelledError once the job has been cancelled. */
  throwIfCancelled(): void;
}

export type JobHandler<P extends JobPayload = JobPayload> = (payload: P, context: JobContext) => Promise<unknown>;

export const JOB_CLASS_OF: Record<JobKind, JobClass> = {
  'ingest-document': 'ingestion',
  'answer-question': 'answer',
};

export function documentLockKey(documentId: string): string {
  return `document:${documentId}`;
}

export function questionLockKey(fingerprint: string): string {
  return `question:${fingerprint}`;
}

export function lockKeyFor(payload: JobPayload): string {
  switch (payload.kind) {
    case 'ingest-document':
      return documentLockKey(payload.documentId);
    case 'answer-question':
      return questionLockKey(payload.fingerprint);
  }
}

export function isTerminal(state: JobState): boolean {
  return state === JobState.Succeeded || state === JobState.Failed;
}

export function isPayloadOf<K extends JobKind>(kind: K, payload: JobPayload): payload is PayloadOf<K> {
  return payload.kind === kind;
}

function isJobPayload(value: unknown): value is JobPayload {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  if (value.kind === 'ingest-document') {
    return 'documentId' in value && typeof value.documentId === 'string';
  }
  if (value.kind === 'answer-question') {
    return (
      'question' in value && typeof value.question === 'string' &&
      'requestId' in value && typeof value.requestId === 'string' &&
      'fingerprint' in value && typeof value.fingerprint === 'string' &&
      (!('topK' in value) || value.topK === undefined || typeof value.topK === 'number') &&
      (!('minSimilarity' in value) || value.minSimilarity === undefined || typeof value.minSimilarity === 'number')
    );
  }
  return false;
}

function isJobState(value: unknown): value is JobState {
  return Object.values<unknown>(JobState).includes(value);
}

/** Shape check for records that arrive from a transport as plain JSON. */
export function isJobRecord(value: unknown): value is JobRecord {
  return (
    typeof value === 'object' && value !== null &&
    'id' in value && typeof value.id === 'string' &&
    'jobClass' in value && (value.jobClass === 'ingestion' || value.jobClass === 'answer') &&
    'payload' in value && isJobPayload(value.payload) &&
    'state' in value && isJobState(value.state) &&
    'attempts' in value && typeof value.attempts === 'number' &&
    'maxAttempts' in value && typeof value.maxAttempts === 'number' &&
    'cancelled' in value && typeof value.cancelled === 'boolean' &&
    'createdAt' in value && typeof value.createdAt === 'string' &&
    'updatedAt' in value && typeof value.updatedAt === 'string'
  );
}
