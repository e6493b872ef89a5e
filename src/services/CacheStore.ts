import { createLogger } from '../utils/logger';

/**
 * Key/value store backing the resolver.
 * Async so a remote backend can stand in for the in-memory one.
 */
export interface CacheStore {
  get(key: string): Promise<unknown>;
  /** @param ttlSeconds - omit to keep the entry until the store evicts it */
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

interface CacheEntry {
  key: string;
  value: unknown;
  expiresAt: number | null;
}

export interface MemoryCacheOptions {
  maxEntries?: number;
  now?: () => number;
}

/**
 * In-process cache with per-entry TTL and a bound on the number of entries.
 * When full, the oldest entry is evicted first.
 */
export class MemoryCacheStore implements CacheStore {
  private static readonly DEFAULT_MAX_ENTRIES = 10000;
  private readonly entries: Map<string, CacheEntry> = new Map();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private readonly logger = createLogger({ component: 'MemoryCacheStore' });

  constructor(options: MemoryCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? MemoryCacheStore.DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    this.entries.set(key, {
      key,
      value,
      expiresAt: ttlSeconds === undefined ? null : this.now() + ttlSeconds * 1000,
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
      this.logger.debug({ key: oldest.value }, 'Evicted cache entry');
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.logger.info('✓ Cache cleared');
  }

  /**
   * Get cache statistics
   */
  getStats() {
    return {
      entries: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
