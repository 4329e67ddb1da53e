export { CacheStore, createCacheStore, type CacheStoreOptions } from './cache-store.js';
export {
  MemoryCacheBackend,
  cacheKey,
  createMemoryCacheBackend,
  type MemoryCacheBackendOptions,
} from './memory-cache-backend.js';
