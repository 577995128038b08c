import { Logger } from '@nestjs/common';
import { RateLimitExceededError } from '../../common/errors/pipeline.errors';

export const RATE_LIMITER = Symbol('RATE_LIMITER');

export interface RateLimiter {
  /** Resolves once a token is granted; rejects with RateLimitExceededError after `timeoutMs`. */
  acquire(timeoutMs: number): Promise<void>;
  tryAcquire(): boolean;
  available(): number;
}

export interface TokenBucketOptions {
  /** Burst size; the bucket starts full. */
  capacity: number;
  refillPerSecond: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

// float slack when comparing the fractional token count against one
const EPSILON = 1e-9;

/**
 * Token bucket shared by every caller of the language model. Tokens refill
 * continuously; waiters are served strictly in arrival order, so a caller
 * that arrives while others wait queues behind them even if a token is
 * available at that instant.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly logger = new Logger(TokenBucketRateLimiter.name);
  private readonly waiters: Waiter[] = [];
  private tokens: number;
  private lastRefill: number;
  private drainTimer?: NodeJS.Timeout;

  constructor(
    private readonly options: TokenBucketOptions,
    private readonly now: () => number = Date.now,
  ) {
    if (!(options.capacity >= 1) || !(options.refillPerSecond > 0)) {
      throw new Error(
        `Token bucket needs capacity >= 1 and a positive refill rate, got ${options.capacity} and ${options.refillPerSecond}`,
      );
    }
    this.tokens = options.capacity;
    this.lastRefill = now();
  }

  acquire(timeoutMs: number): Promise<void> {
    if (this.tryAcquire()) {
      return Promise.resolve();
    }
    if (timeoutMs <= 0) {
      return Promise.reject(new RateLimitExceededError(timeoutMs));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          if (this.waiters.length === 0 && this.drainTimer) {
            clearTimeout(this.drainTimer);
            this.drainTimer = undefined;
          }
          this.logger.warn(`Rate limit wait exceeded ${timeoutMs}ms (${this.waiters.length} still waiting)`);
          reject(new RateLimitExceededError(timeoutMs));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
      this.scheduleDrain();
    });
  }

  tryAcquire(): boolean {
    this.refill();
    if (this.waiters.length > 0 || this.tokens + EPSILON < 1) {
      return false;
    }
    this.tokens -= 1;
    return true;
  }

  available(): number {
    this.refill();
    return Math.floor(this.tokens + EPSILON);
  }

  private refill(): void {
    const current = this.now();
    const elapsedMs = current - this.lastRefill;
    if (elapsedMs > 0) {
      this.tokens = Math.min(
        this.options.capacity,
        this.tokens + (elapsedMs * this.options.refillPerSecond) / 1000,
      );
      this.lastRefill = current;
    }
  }

  private drain(): void {
    this.drainTimer = undefined;
    this.refill();
    while (this.waiters.length > 0 && this.tokens + EPSILON >= 1) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      this.tokens -= 1;
      clearTimeout(waiter.timer);
      waiter.resolve();
    }
    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.drainTimer || this.waiters.length === 0) {
      return;
    }
    const missing = Math.max(0, 1 - this.tokens);
    const delayMs = Math.ceil((missing * 1000) / this.options.refillPerSecond);
    this.drainTimer = setTimeout(() => this.drain(), delayMs);
  }
}
