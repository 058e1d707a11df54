/**
 * Token Bucket Admission Controller
 *
 * Accumulates tokens at a steady rate up to a fixed capacity and spends
 * them on admission. Rejection is immediate: there is no queueing and no
 * blocking, the caller decides how to react.
 */

import { InvalidConfigurationError } from '../errors';
import type { StructuredLogger } from '../observability/structured-logger';

export interface TokenBucketOptions {
  /** Name of the limiter for logging */
  name: string;
  /** Maximum tokens the bucket can hold */
  capacity: number;
  /** Tokens added per second */
  refillRate: number;
  /** Clock source, epoch ms */
  now?: () => number;
  logger?: StructuredLogger;
  /** Callback when an acquire is rejected */
  onLimitExceeded?: (info: RateLimitInfo) => void;
}

export interface RateLimitInfo {
  /** Bucket capacity */
  limit: number;
  /** Tokens left after this call, possibly fractional */
  remaining: number;
  /** Time in ms until the requested cost is affordable; null when it never will be */
  retryAfterMs: number | null;
  /** Whether the request is allowed */
  allowed: boolean;
}

export class TokenBucketLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;

  constructor(private readonly options: TokenBucketOptions) {
    const issues: string[] = [];
    if (!Number.isFinite(options.capacity) || options.capacity < 0) {
      issues.push(`capacity must be a non-negative number, got ${options.capacity}`);
    }
    if (!Number.isFinite(options.refillRate) || options.refillRate < 0) {
      issues.push(`refillRate must be a non-negative number, got ${options.refillRate}`);
    }
    if (issues.length > 0) {
      throw new InvalidConfigurationError(`Token bucket '${options.name}' misconfigured`, issues);
    }

    this.now = options.now ?? Date.now;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
  }

  /**
   * Take `cost` tokens if the bucket holds enough. Never blocks.
   */
  tryAcquire(cost: number = 1): boolean {
    return this.consume(cost).allowed;
  }

  /**
   * Refill, then attempt to spend `cost` tokens
   */
  consume(cost: number = 1): RateLimitInfo {
    if (!Number.isInteger(cost) || cost <= 0) {
      throw new RangeError(`cost must be a positive integer, got ${cost}`);
    }

    this.refill();

    const allowed = this.tokens - cost >= 0;
    if (allowed) {
      this.tokens -= cost;
    }

    const info: RateLimitInfo = {
      limit: this.options.capacity,
      remaining: this.tokens,
      retryAfterMs: allowed ? 0 : this.retryAfter(cost),
      allowed,
    };

    if (!allowed) {
      this.options.logger?.warn('Rate limit exceeded', {
        limiter: this.options.name,
        cost,
        remaining: info.remaining,
      });
      this.options.onLimitExceeded?.(info);
    }

    return info;
  }

  /**
   * Current token count including refill accrued since the last call.
   * Does not mutate the bucket.
   */
  availableTokens(): number {
    const elapsed = Math.max(0, this.now() - this.lastRefill);
    return Math.min(this.options.capacity, this.tokens + (elapsed / 1000) * this.options.refillRate);
  }

  /**
   * Refill the bucket to capacity
   */
  reset(): void {
    this.tokens = this.options.capacity;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    // Clock stepped backwards: accrue nothing
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.options.capacity, this.tokens + (elapsed / 1000) * this.options.refillRate);
    this.lastRefill = now;
  }

  private retryAfter(cost: number): number | null {
    if (cost > this.options.capacity || this.options.refillRate === 0) {
      return null;
    }
    return Math.ceil(((cost - this.tokens) / this.options.refillRate) * 1000);
  }
}
