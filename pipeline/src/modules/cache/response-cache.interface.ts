export const RESPONSE_CACHE = Symbol('RESPONSE_CACHE');

export interface CacheEntry {
  question: string;
  answer: string;
  /** Ids of the chunks the answer was grounded on. */
  evidence: string[];
  createdAt: string;
  expiresAt: string;
}

/**
 * Memoized answers keyed by question fingerprint. A `put` replaces the
 * whole entry; `get` never returns an entry past its `expiresAt`, even if
 * the backing store still holds it.
 */
export interface ResponseCache {
  get(fingerprint: string): Promise<CacheEntry | null>;
  put(fingerprint: string, entry: CacheEntry, ttlSeconds: number): Promise<void>;
  delete(fingerprint: string): Promise<void>;
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' && value !== null &&
    'question' in value && typeof value.question === 'string' &&
    'answer' in value && typeof value.answer === 'string' &&
    'evidence' in value && Array.isArray(value.evidence) &&
    value.evidence.every((id: unknown) => typeof id === 'string') &&
    'createdAt' in value && typeof value.createdAt === 'string' &&
    'expiresAt' in value && typeof value.expiresAt === 'string'
  );
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return Date.parse(entry.expiresAt) <= now;
}
