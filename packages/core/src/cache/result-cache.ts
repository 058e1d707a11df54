/**
 * Result Cache
 *
 * In-memory memoization of backend results keyed by request fingerprint:
 * - Fixed TTL per entry, expired entries are logically absent
 * - Lazy eviction on read, optional periodic sweep
 * - Optional size bound evicting the oldest insertion first
 */

import { InvalidConfigurationError } from '../errors';

export interface ResultCacheOptions {
  /** Entry lifetime in ms */
  ttl: number;
  /** Maximum entries held; 0 disables the bound */
  maxEntries: number;
  /** Sweep expired entries every N ms; disabled when omitted */
  sweepInterval?: number;
  /** Clock source, epoch ms */
  now?: () => number;
  /** Callback for cache metrics */
  onMetric?: (metric: CacheMetric) => void;
}

export interface CacheMetric {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  expirations: number;
  hitRate: number;
  size: number;
}

interface CacheEntry<T> {
  value: T;
  insertedAt: number;
}

export class ResultCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();
  private hits: number = 0;
  private misses: number = 0;
  private sets: number = 0;
  private evictions: number = 0;
  private expirations: number = 0;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly options: ResultCacheOptions) {
    const issues: string[] = [];
    if (!Number.isFinite(options.ttl) || options.ttl < 0) {
      issues.push(`ttl must be non-negative, got ${options.ttl}`);
    }
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 0) {
      issues.push(`maxEntries must be a non-negative integer, got ${options.maxEntries}`);
    }
    if (options.sweepInterval !== undefined && !(options.sweepInterval > 0)) {
      issues.push(`sweepInterval must be positive, got ${options.sweepInterval}`);
    }
    if (issues.length > 0) {
      throw new InvalidConfigurationError('Result cache misconfigured', issues);
    }

    this.now = options.now ?? Date.now;

    if (options.sweepInterval !== undefined) {
      this.sweepTimer = setInterval(() => this.prune(), options.sweepInterval);
      this.sweepTimer.unref();
    }
  }

  /**
   * Get a live entry; an expired one is evicted and reported absent
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);

    if (entry && this.isLive(entry)) {
      this.hits++;
      this.emitMetric();
      return entry.value;
    }

    if (entry) {
      this.entries.delete(key);
      this.expirations++;
    }

    this.misses++;
    this.emitMetric();
    return undefined;
  }

  /**
   * Store a value, replacing any previous entry for the key
   */
  put(key: string, value: T): void {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    this.entries.set(key, { value, insertedAt: this.now() });
    this.sets++;

    if (this.options.maxEntries > 0) {
      while (this.entries.size > this.options.maxEntries) {
        this.evictOldest();
      }
    }

    this.emitMetric();
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.isLive(entry);
  }

  /**
   * Number of entries physically held, live or not yet evicted
   */
  size(): number {
    return this.entries.size;
  }

  /**
   * Remove every expired entry, returning how many were dropped
   */
  prune(): number {
    let count = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isLive(entry)) {
        this.entries.delete(key);
        count++;
      }
    }
    this.expirations += count;
    return count;
  }

  /**
   * Get cache metrics
   */
  getMetrics(): CacheMetric {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      evictions: this.evictions,
      expirations: this.expirations,
      hitRate: total > 0 ? this.hits / total : 0,
      size: this.entries.size,
    };
  }

  /**
   * Stop the sweep timer and drop all entries
   */
  destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }

  private isLive(entry: CacheEntry<T>): boolean {
    return this.now() - entry.insertedAt < this.options.ttl;
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  private emitMetric(): void {
    this.options.onMetric?.(this.getMetrics());
  }
}
