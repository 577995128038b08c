/** What an answer job produces; shared by every caller joined on it. */
export interface AnswerOutcome {
  answer: string;
  evidence: string[];
  cached: boolean;
}

export interface AnswerResult extends AnswerOutcome {
  requestId: string;
  question: string;
  answeredAt: string;
}

/** Per-request overrides of the configured retrieval settings. */
export interface AnswerOptions {
  similarityLimit?: number;
  maxResponses?: number;
}

export interface RetrievalOptions {
  topK: number;
  minSimilarity: number;
}

/**
 * Cache, lock and job key of an answer. Answers retrieved with the
 * configured settings are keyed by the question fingerprint alone.
 */
export function answerKey(
  questionFingerprint: string,
  retrieval: RetrievalOptions,
  defaults: RetrievalOptions,
): string {
  if (retrieval.topK === defaults.topK && retrieval.minSimilarity === defaults.minSimilarity) {
    return questionFingerprint;
  }
  return `${questionFingerprint}-k${retrieval.topK}-s${retrieval.minSimilarity}`;
}

export function ingestJobId(documentId: string): string {
  return `ingest-${documentId}`;
}

export function answerJobId(fingerprint: string): string {
  return `answer-${fingerprint}`;
}

export function isAnswerOutcome(value: unknown): value is AnswerOutcome {
  return (
    typeof value === 'object' && value !== null &&
    'answer' in value && typeof value.answer === 'string' &&
    'evidence' in value && Array.isArray(value.evidence) &&
    value.evidence.every((id: unknown) => typeof id === 'string') &&
    'cached' in value && typeof value.cached === 'boolean'
  );
}
