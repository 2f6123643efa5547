import type { CacheStore } from '../cache/types.js';

/**
 * A store with only the four required operations, each settling after
 * `delayMs`. Lets two callers interleave between a `get` and its `delete`.
 */
export class DelayedCacheStore implements CacheStore {
  public readonly calls: string[] = [];
  private readonly values = new Map<string, string>();

  constructor(private readonly delayMs = 5) {}

  async get(key: string): Promise<string | undefined> {
    this.calls.push(`get ${key}`);
    await this.pause();
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.calls.push(`set ${key}`);
    await this.pause();
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.calls.push(`delete ${key}`);
    await this.pause();
    this.values.delete(key);
  }

  async clear(): Promise<void> {
    await this.pause();
    this.values.clear();
  }

  private pause(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, this.delayMs));
  }
}
