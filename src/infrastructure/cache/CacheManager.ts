/**
 * Gatehouse - Cache Manager
 *
 * LRU cache with per-entry TTL, guarded by a mutex so that every
 * read-modify-write (expire-on-read, evict-then-insert, prune) is atomic
 * with respect to other callers.
 */

import { createMutex, Mutex } from '../concurrency/mutex';

/**
 * Cache entry with value and metadata
 */
export interface CacheEntry<V> {
  key: string;
  value: V;
  insertedAt: number;
  ttl: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

export interface CacheManagerOptions {
  /** Maximum number of entries before the least recently used is evicted */
  capacity?: number;

  /** TTL in milliseconds for entries set without one */
  defaultTtl?: number;

  /** Clock, epoch milliseconds */
  now?: () => number;
}

/** Generic cache service TTL: five minutes */
export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

/**
 * CacheManager - LRU cache with TTL
 *
 * An entry is valid while `now - insertedAt < ttl`.
 *
 * @example
 * ```typescript
 * const cache = new CacheManager<string>({ defaultTtl: 30_000 });
 *
 * await cache.set('GET:/goodbye', body);
 * const hit = await cache.get('GET:/goodbye');
 * ```
 */
export class CacheManager<V> {
  private readonly cache: Map<string, CacheEntry<V>> = new Map();
  private readonly mutex: Mutex = createMutex();
  private readonly capacity: number;
  private readonly defaultTtl: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheManagerOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.defaultTtl = options.defaultTtl ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get a value if present and not expired
   */
  get(key: string): Promise<V | undefined> {
    return this.mutex.runExclusive(() => {
      const entry = this.cache.get(key);

      if (!entry) {
        this.misses++;
        return undefined;
      }

      if (!this.isFresh(entry)) {
        this.cache.delete(key);
        this.misses++;
        return undefined;
      }

      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, entry);

      this.hits++;
      return entry.value;
    });
  }

  /**
   * Set a value, replacing any previous entry whole
   *
   * @param ttl - Time to live in milliseconds (defaults to the store TTL)
   */
  set(key: string, value: V, ttl: number = this.defaultTtl): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.cache.delete(key);

      if (this.cache.size >= this.capacity) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }

      this.cache.set(key, { key, value, insertedAt: this.now(), ttl });
    });
  }

  /**
   * Check if key exists (and is not expired)
   */
  has(key: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const entry = this.cache.get(key);
      if (!entry) return false;

      if (!this.isFresh(entry)) {
        this.cache.delete(key);
        return false;
      }
      return true;
    });
  }

  delete(key: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.cache.delete(key));
  }

  /**
   * Clear all entries and statistics
   */
  clear(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.cache.clear();
      this.hits = 0;
      this.misses = 0;
    });
  }

  /**
   * Remove expired entries, returning how many were removed
   */
  prune(): Promise<number> {
    return this.mutex.runExclusive(() => {
      let pruned = 0;
      for (const [key, entry] of this.cache) {
        if (!this.isFresh(entry)) {
          this.cache.delete(key);
          pruned++;
        }
      }
      return pruned;
    });
  }

  /**
   * Get cache statistics
   */
  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  get size(): number {
    return this.cache.size;
  }

  private isFresh(entry: CacheEntry<V>): boolean {
    return this.now() - entry.insertedAt < entry.ttl;
  }
}
