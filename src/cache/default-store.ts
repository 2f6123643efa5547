import type { CacheStore } from './types.js';
import { MemoryCacheStore } from './memory-store.js';

// Process-wide shared state: created on first use, replaced or reset explicitly.
let defaultStore: CacheStore | undefined;

/**
 * The cache used by AuthRequests built without an explicit `cacheStore`.
 * A MemoryCacheStore is created on first call; multi-instance deployments
 * should install a shared store with {@link setDefaultCacheStore} at startup.
 */
export function getDefaultCacheStore(): CacheStore {
  if (!defaultStore) {
    defaultStore = new MemoryCacheStore();
  }
  return defaultStore;
}

export function setDefaultCacheStore(store: CacheStore): void {
  defaultStore = store;
}

/**
 * Forget the current default so the next {@link getDefaultCacheStore} call
 * creates a fresh one.
 */
export function resetDefaultCacheStore(): void {
  defaultStore = undefined;
}
