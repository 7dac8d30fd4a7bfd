import { normalizeAddress, normalizeChain } from '../utils/helpers.js';

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface ResultCacheOptions {
  ttlSeconds: number;
  /** Oldest entries are evicted past this size. 0 = unbounded. */
  maxEntries?: number;
  now?: () => number;
}

export function cacheKey(source: string, chain: string, query: string): string {
  return `${source}:${normalizeChain(chain)}:${normalizeAddress(query)}`;
}

/**
 * Process-local TTL cache. An entry is valid while `now - storedAt < ttl`;
 * expired entries are dropped when looked up.
 */
export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(opts: ResultCacheOptions) {
    this.ttlMs = opts.ttlSeconds * 1000;
    this.maxEntries = opts.maxEntries ?? 0;
    this.now = opts.now ?? (() => Date.now());
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  put(key: string, value: T): void {
    // Re-insert so Map order tracks recency of writes
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now() });

    if (this.maxEntries > 0) {
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
