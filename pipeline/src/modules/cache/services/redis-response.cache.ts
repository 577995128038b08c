import { Logger } from '@nestjs/common';
import { describeError } from '../../../common/errors/pipeline.errors';
import { CacheEntry, isCacheEntry, isExpired, ResponseCache } from '../response-cache.interface';

/** The Redis commands the cache issues. */
export interface CacheRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

/**
 * Answers stored as JSON strings under `<prefix>:answer:<fingerprint>` with
 * a Redis-side TTL. Read and write failures are logged and treated as a
 * miss or a skipped write: a cache outage must not fail a question.
 */
export class RedisResponseCache implements ResponseCache {
  private readonly logger = new Logger(RedisResponseCache.name);

  constructor(
    private readonly redis: CacheRedisClient,
    private readonly prefix: string,
    private readonly now: () => number = Date.now,
  ) {}

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const key = this.key(fingerprint);
    let raw: string | null;
    try {
      raw = await this.redis.get(key);
    } catch (error) {
      this.logger.warn(`Redis GET failed for ${key}: ${describeError(error)}`);
      return null;
    }
    if (!raw) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Discarding unreadable cache entry ${key}: ${describeError(error)}`);
      return null;
    }
    if (!isCacheEntry(parsed) || isExpired(parsed, this.now())) {
      return null;
    }
    return parsed;
  }

  async put(fingerprint: string, entry: CacheEntry, ttlSeconds: number): Promise<void> {
    const key = this.key(fingerprint);
    try {
      await this.redis.set(key, JSON.stringify(entry), 'EX', Math.max(1, Math.ceil(ttlSeconds)));
    } catch (error) {
      this.logger.warn(`Redis SET failed for ${key}: ${describeError(error)}`);
    }
  }

  async delete(fingerprint: string): Promise<void> {
    const key = this.key(fingerprint);
    try {
      await this.redis.del(key);
    } catch (error) {
      this.logger.warn(`Redis DEL failed for ${key}: ${describeError(error)}`);
    }
  }

  private key(fingerprint: string): string {
    return `${this.prefix}:answer:${fingerprint}`;
  }
}
