import type { RedisClientLike } from '../cache/redis-store.js';

type Entry = { value: string; expiresAt: number };

/**
 * In-process stand-in for the ioredis calls RedisCacheStore makes. Expiry
 * follows the supplied clock.
 */
export class FakeRedis implements RedisClientLike {
  public readonly calls: string[] = [];
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    this.calls.push(`get ${key}`);
    return this.read(key) ?? null;
  }

  async set(
    key: string,
    value: string,
    _secondsToken: 'EX',
    seconds: number
  ): Promise<'OK'> {
    this.calls.push(`set ${key} EX ${seconds}`);
    this.entries.set(key, { value, expiresAt: this.now() + seconds * 1000 });
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.calls.push(`del ${keys.join(' ')}`);
    let removed = 0;
    for (const key of keys) {
      if (this.read(key) !== undefined) removed += 1;
      this.entries.delete(key);
    }
    return removed;
  }

  async keys(pattern: string): Promise<string[]> {
    this.calls.push(`keys ${pattern}`);
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    return [...this.entries.keys()].filter(
      (key) => key.startsWith(prefix) && this.read(key) !== undefined
    );
  }

  async getdel(key: string): Promise<string | null> {
    this.calls.push(`getdel ${key}`);
    const value = this.read(key);
    this.entries.delete(key);
    return value ?? null;
  }

  async quit(): Promise<'OK'> {
    this.calls.push('quit');
    return 'OK';
  }

  private read(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }
}
