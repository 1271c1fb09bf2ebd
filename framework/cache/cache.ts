/**
 * Cache Implementation
 *
 * In-process cache with per-entry TTL. Expired entries are dropped when
 * read and swept whenever a new key is stored. When `maxSize` is set, the
 * oldest entry is evicted to make room for a new key.
 */

import { withSpan, isOTELEnabled, SpanKind } from '../telemetry/otel.ts';

export interface CacheEntry<V> {
  value: V;
  expiresAt: number | null;
  createdAt: number;
}

export interface CacheOptions {
  defaultTtl?: number; // in milliseconds, 0 for no expiry
  maxSize?: number; // maximum number of entries
  clock?: () => number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

const DEFAULT_TTL = 3600000; // 1 hour in milliseconds

/**
 * Cache manager
 */
export class Cache<V = unknown> {
  private entries = new Map<string, CacheEntry<V>>();
  private defaultTtl: number;
  private maxSize?: number;
  private now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: CacheOptions = {}) {
    this.defaultTtl = options.defaultTtl ?? DEFAULT_TTL;
    this.maxSize = options.maxSize;
    this.now = options.clock ?? Date.now;
  }

  /**
   * Number of stored entries, expired ones included until the next read or sweep
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Get a cached value, or undefined when absent or expired
   */
  async get(key: string): Promise<V | undefined> {
    if (!isOTELEnabled()) {
      return this.lookup(key);
    }

    return await withSpan('cache.get', async (span) => {
      span.setAttribute('cache.key', key);
      const value = this.lookup(key);
      span.setAttribute('cache.hit', value !== undefined);
      return value;
    }, { kind: SpanKind.INTERNAL });
  }

  /**
   * Set a cached value. `ttl` overrides the default; 0 never expires.
   */
  async set(key: string, value: V, ttl?: number): Promise<void> {
    const ttlMs = ttl ?? this.defaultTtl;

    if (!isOTELEnabled()) {
      this.store(key, value, ttlMs);
      return;
    }

    await withSpan('cache.set', async (span) => {
      span.setAttribute('cache.key', key);
      span.setAttribute('cache.ttl_ms', ttlMs);
      this.store(key, value, ttlMs);
    }, { kind: SpanKind.INTERNAL });
  }

  /**
   * Get a cached value, computing and storing it on a miss
   */
  async getOrSet(key: string, factory: () => Promise<V> | V, ttl?: number): Promise<V> {
    const cached = await this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await factory();
    await this.set(key, value, ttl);
    return value;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /**
   * Delete every entry whose key starts with `prefix`
   */
  async deleteByPrefix(prefix: string): Promise<number> {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        count++;
      }
    }
    return count;
  }

  async has(key: string): Promise<boolean> {
    return this.peek(key) !== undefined;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  getStats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private peek(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private lookup(key: string): V | undefined {
    const entry = this.peek(key);
    if (entry) {
      this.hits++;
      return entry.value;
    }
    this.misses++;
    return undefined;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  private store(key: string, value: V, ttlMs: number): void {
    const createdAt = this.now();

    // Re-inserting moves the key to the end of the eviction order
    this.entries.delete(key);
    this.sweep(createdAt);

    if (this.maxSize !== undefined) {
      while (this.entries.size >= this.maxSize) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    }

    this.entries.set(key, {
      value,
      expiresAt: ttlMs > 0 ? createdAt + ttlMs : null,
      createdAt,
    });
  }
}
