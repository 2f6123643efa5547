import { Redis } from 'ioredis';
import type { CacheStore } from './types.js';

/**
 * The subset of the ioredis client this store relies on. Any client with the
 * same call shapes (a cluster client, a test double) can be used instead.
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(
    key: string,
    value: string,
    secondsToken: 'EX',
    seconds: number
  ): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  getdel?(key: string): Promise<string | null>;
  quit?(): Promise<unknown>;
}

export type RedisCacheStoreOptions = {
  client: RedisClientLike;
  /** Prepended to every key. Default `oauth:` */
  prefix?: string;
  /** TTL used when `set` is called without one. Default 180 seconds */
  defaultTtlSeconds?: number;
};

/**
 * Cache backed by a shared Redis instance, using Redis-native expiry.
 */
export class RedisCacheStore implements CacheStore {
  static readonly DEFAULT_PREFIX = 'oauth:';
  static readonly DEFAULT_TTL_SECONDS = 180;

  private readonly client: RedisClientLike;
  public readonly prefix: string;
  private readonly defaultTtlSeconds: number;

  constructor(options: RedisCacheStoreOptions) {
    this.client = options.client;
    this.prefix = options.prefix ?? RedisCacheStore.DEFAULT_PREFIX;
    this.defaultTtlSeconds =
      options.defaultTtlSeconds ?? RedisCacheStore.DEFAULT_TTL_SECONDS;
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.client.get(this.prefixed(key));
    return value ?? undefined;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    if (ttl <= 0) {
      await this.delete(key);
      return;
    }
    // EX takes whole seconds; never round a live entry down to zero
    await this.client.set(
      this.prefixed(key),
      value,
      'EX',
      Math.max(1, Math.ceil(ttl))
    );
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.prefixed(key));
  }

  async clear(): Promise<void> {
    const keys = await this.client.keys(`${this.prefix}*`);
    if (keys.length > 0) {
      await this.client.del(...keys);
    }
  }

  async take(key: string): Promise<string | undefined> {
    const fullKey = this.prefixed(key);
    if (this.client.getdel) {
      const value = await this.client.getdel(fullKey);
      return value ?? undefined;
    }
    const value = await this.client.get(fullKey);
    await this.client.del(fullKey);
    return value ?? undefined;
  }

  async disconnect(): Promise<void> {
    if (this.client.quit) {
      await this.client.quit();
    }
  }

  private prefixed(key: string): string {
    return `${this.prefix}${key}`;
  }
}

/**
 * Build a RedisCacheStore over a new ioredis connection.
 *
 * @param url - Redis connection string, e.g. `redis://localhost:6379/0`
 */
export function createRedisCacheStore(
  url: string,
  options: Omit<RedisCacheStoreOptions, 'client'> = {}
): RedisCacheStore {
  return new RedisCacheStore({ ...options, client: new Redis(url) });
}
