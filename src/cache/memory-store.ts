import type { CacheStore } from './types.js';

type Entry = { value: string; expiresAt: number };

export type MemoryCacheStoreOptions = {
  /** Maximum number of live entries; the oldest is evicted past this. Default 1000 */
  maxSize?: number;
  /** TTL used when `set` is called without one. Default 180 seconds */
  defaultTtlSeconds?: number;
  /** Clock in milliseconds, for tests */
  now?: () => number;
};

/**
 * In-process cache. Expired entries are dropped lazily when read and swept
 * when the store is full.
 */
export class MemoryCacheStore implements CacheStore {
  static readonly DEFAULT_MAX_SIZE = 1000;
  static readonly DEFAULT_TTL_SECONDS = 180;

  private readonly entries = new Map<string, Entry>();
  private readonly maxSize: number;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxSize = options.maxSize ?? MemoryCacheStore.DEFAULT_MAX_SIZE;
    this.defaultTtlSeconds =
      options.defaultTtlSeconds ?? MemoryCacheStore.DEFAULT_TTL_SECONDS;
    this.now = options.now ?? Date.now;

    if (this.maxSize < 1) {
      throw new RangeError('maxSize must be at least 1');
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | undefined> {
    return this.read(key)?.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    if (ttl <= 0) {
      this.entries.delete(key);
      return;
    }

    // re-inserting moves the key to the end of the eviction order
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      this.sweep();
    }
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.now() + ttl * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async take(key: string): Promise<string | undefined> {
    const entry = this.read(key);
    this.entries.delete(key);
    return entry?.value;
  }

  /**
   * Seconds until `key` expires, or undefined when it is absent or expired.
   */
  remainingTtl(key: string): number | undefined {
    const entry = this.read(key);
    if (!entry) return undefined;
    return Math.max(0, Math.ceil((entry.expiresAt - this.now()) / 1000));
  }

  /**
   * Drop every expired entry. Returns the number removed.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private read(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
