import { config } from '../config/index.js';
import { BaseErrorCode, PipelineError } from '../types-global/errors.js';
import { AsyncLock } from '../utils/internal/asyncLock.js';
import { logger } from '../utils/internal/logger.js';
import {
  CacheEntry,
  CacheEntryInfo,
  CacheOptions,
  CacheStats,
  ComputeFn,
} from './cache-types.js';

function toPercent(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;
}

/**
 * Bounded in-memory cache with per-entry expiry and LRU eviction.
 *
 * Map insertion order doubles as recency order: the first key is the least
 * recently used. Every map operation runs under one exclusive lock; the lock
 * is never held while a `getOrCompute` computation runs.
 */
export class TTLCache<V = unknown> {
  private readonly cache = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly lock = new AsyncLock();
  private readonly maxSize: number;
  private readonly defaultTtlMs: number;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheOptions = {}) {
    this.maxSize = options.maxSize ?? config.cache.maxSize;
    this.defaultTtlMs = options.defaultTtlMs ?? config.cache.defaultTtlMs;

    if (!Number.isInteger(this.maxSize) || this.maxSize <= 0) {
      throw new PipelineError(
        BaseErrorCode.VALIDATION_ERROR,
        `Cache maxSize must be a positive integer, got ${this.maxSize}`
      );
    }
    this.assertTtl(this.defaultTtlMs);
  }

  /**
   * Returns the value if present and unexpired, marking it most recently used.
   */
  async get(key: string): Promise<V | undefined> {
    const entry = await this.lock.runExclusive(() => this.readEntry(key));
    return entry?.value;
  }

  async set(key: string, value: V, ttlMs: number = this.defaultTtlMs): Promise<void> {
    this.assertTtl(ttlMs);
    await this.lock.runExclusive(() => this.writeEntry(key, value, ttlMs));
  }

  /**
   * Returns the cached value for `key`, or computes, stores and returns it.
   *
   * Concurrent misses on the same key share one computation. A rejected
   * computation stores nothing and rejects every caller waiting on it.
   */
  async getOrCompute(key: string, computeFn: ComputeFn<V>, ttlMs: number = this.defaultTtlMs): Promise<V> {
    this.assertTtl(ttlMs);
    const cached = await this.lock.runExclusive(() => this.readEntry(key));
    if (cached) {
      return cached.value;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug('Joining in-flight computation', { component: 'TTLCache', key });
      return pending;
    }

    const computation = (async () => {
      try {
        const value = await computeFn();
        await this.lock.runExclusive(() => this.writeEntry(key, value, ttlMs));
        return value;
      } finally {
        this.inFlight.delete(key);
      }
    })();
    this.inFlight.set(key, computation);
    return computation;
  }

  async delete(key: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.cache.delete(key));
  }

  /**
   * Removes every entry and resets the hit/miss counters.
   */
  async clear(): Promise<void> {
    const cleared = await this.lock.runExclusive(() => {
      const size = this.cache.size;
      this.cache.clear();
      this.hits = 0;
      this.misses = 0;
      return size;
    });

    logger.info('Cache cleared', { component: 'TTLCache', entriesCleared: cleared });
  }

  /**
   * Removes every entry whose expiry has passed.
   * @returns The number of entries removed.
   */
  async cleanupExpired(): Promise<number> {
    const removed = await this.lock.runExclusive(() => {
      const now = Date.now();
      let count = 0;
      for (const [key, entry] of this.cache) {
        if (now >= entry.expiresAt) {
          this.cache.delete(key);
          count++;
        }
      }
      return count;
    });

    if (removed > 0) {
      logger.debug('Expired cache entries removed', {
        component: 'TTLCache',
        entriesRemoved: removed,
        remainingEntries: this.cache.size,
      });
    }
    return removed;
  }

  getStats(): CacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      size: this.cache.size,
      capacity: this.maxSize,
      utilization: toPercent(this.cache.size, this.maxSize),
      hits: this.hits,
      misses: this.misses,
      totalRequests,
      hitRate: toPercent(this.hits, totalRequests),
    };
  }

  /**
   * Entry metadata without touching recency or hit/miss counters.
   */
  peekEntry(key: string): CacheEntryInfo | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }
    return { createdAt: entry.createdAt, expiresAt: entry.expiresAt, hits: entry.hits };
  }

  get size(): number {
    return this.cache.size;
  }

  // Callers hold the lock.
  private readEntry(key: string): CacheEntry<V> | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    entry.hits++;
    this.hits++;

    // Re-insert to move the key to the most recently used position
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry;
  }

  // Callers hold the lock.
  private writeEntry(key: string, value: V, ttlMs: number): void {
    const now = Date.now();

    if (!this.cache.has(key) && this.cache.size >= this.maxSize) {
      this.evictLeastRecentlyUsed();
    }

    this.cache.delete(key);
    this.cache.set(key, {
      value,
      expiresAt: now + ttlMs,
      createdAt: now,
      hits: 0,
    });
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.cache.delete(oldest.value);
      logger.debug('Evicted LRU entry', { component: 'TTLCache', key: oldest.value });
    }
  }

  private assertTtl(ttlMs: number): void {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new PipelineError(
        BaseErrorCode.VALIDATION_ERROR,
        `Cache TTL must be a positive number of milliseconds, got ${ttlMs}`
      );
    }
  }
}
