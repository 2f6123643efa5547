export type { CacheStore } from './types.js';
export { takeFromCache } from './types.js';
export { MemoryCacheStore, type MemoryCacheStoreOptions } from './memory-store.js';
export {
  RedisCacheStore,
  createRedisCacheStore,
  type RedisClientLike,
  type RedisCacheStoreOptions,
} from './redis-store.js';
export {
  getDefaultCacheStore,
  setDefaultCacheStore,
  resetDefaultCacheStore,
} from './default-store.js';
