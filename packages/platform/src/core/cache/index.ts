/**
 * Cache Layer
 *
 * Versioned, per-actor list cache over a pluggable CacheStore
 * (Redis when REDIS_URL is set, process memory otherwise).
 */

export { pageKey, versionKey, parseVersion } from "./cache-keys.js";
export { ListCache, type ListCacheOptions, type ListPageRequest } from "./list-cache.js";
export {
  CacheInvalidator,
  collectAudience,
  type InvalidationFailure,
  type InvalidationReport,
} from "./invalidation.js";
export { MemoryCacheStore, type MemoryCacheStoreOptions } from "./memory-cache-store.js";
export {
  RedisCacheStore,
  connectRedisCacheStore,
  redisReconnectDelay,
  REDIS_MAX_RECONNECT_DELAY_MS,
  type RedisClient,
  type RedisCacheStoreOptions,
} from "./redis-cache-store.js";
