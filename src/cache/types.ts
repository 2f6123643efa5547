/**
 * Key/value store with per-entry TTL. Backs anti-forgery state and the
 * transient OAuth 1.0a token secrets between `authorize` and `login`.
 *
 * Implementations must stop returning a value once its TTL has elapsed, and a
 * `set` must be visible to any caller's `get` once the returned promise settles.
 */
export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  /**
   * Atomically read and remove a key. Stores that can do this in one step
   * should, so a state token can never validate twice under concurrency.
   */
  take?(key: string): Promise<string | undefined>;
}

const claims = new WeakMap<CacheStore, Set<string>>();

/**
 * Read and remove a key, using the store's atomic `take` when it has one.
 *
 * Stores without `take` fall back to `get` then `delete`. While that is in
 * flight the key is claimed for this process, and any concurrent caller is
 * answered with `undefined`, so a key is handed out at most once. Stores
 * shared between processes need `take` for the same guarantee.
 */
export async function takeFromCache(
  store: CacheStore,
  key: string
): Promise<string | undefined> {
  if (store.take) {
    return store.take(key);
  }

  let claimed = claims.get(store);
  if (!claimed) {
    claimed = new Set();
    claims.set(store, claimed);
  }
  if (claimed.has(key)) {
    return undefined;
  }
  claimed.add(key);
  try {
    const value = await store.get(key);
    await store.delete(key);
    return value;
  } finally {
    claimed.delete(key);
  }
}
