import { CacheEntry, isExpired, ResponseCache } from '../response-cache.interface';

interface StoredEntry {
  entry: CacheEntry;
  /** Epoch ms after which the entry is gone, like a Redis key TTL. */
  evictAt: number;
}

export class InMemoryResponseCache implements ResponseCache {
  private readonly entries = new Map<string, StoredEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const stored = this.entries.get(fingerprint);
    if (!stored) return null;
    const now = this.now();
    if (stored.evictAt <= now || isExpired(stored.entry, now)) {
      this.entries.delete(fingerprint);
      return null;
    }
    return { ...stored.entry, evidence: [...stored.entry.evidence] };
  }

  async put(fingerprint: string, entry: CacheEntry, ttlSeconds: number): Promise<void> {
    this.entries.set(fingerprint, {
      entry: { ...entry, evidence: [...entry.evidence] },
      evictAt: this.now() + Math.max(1, Math.ceil(ttlSeconds)) * 1000,
    });
  }

  async delete(fingerprint: string): Promise<void> {
    this.entries.delete(fingerprint);
  }
}
