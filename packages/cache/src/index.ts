export {
  CACHE_ENV_PREFIX,
  type CacheConfig,
  cacheConfigSchema,
  createCacheFromConfig,
  type LoadCacheConfigOptions,
  loadCacheConfig,
} from "./core/config/cache-config"
export { createCache } from "./core/create-cache"
export { InvalidCapacityError } from "./core/errors/invalid-capacity-error"
export { isKeyNotFoundError, KeyNotFoundError } from "./core/errors/key-not-found-error"
export { FifoCache } from "./core/eviction/fifo-cache"
export { FiloCache } from "./core/eviction/filo-cache"
export { LfuCache } from "./core/eviction/lfu-cache"
export { LruCache } from "./core/eviction/lru-cache"
export type { Cache } from "./ports/cache"
export {
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
  type FifoCacheEvictionPolicy,
  type FiloCacheEvictionPolicy,
  type LfuCacheEvictionPolicy,
  type LruCacheEvictionPolicy,
} from "./ports/cache-eviction-policy"
export type { CacheDeps, CacheOptions } from "./ports/cache-options"
export type { KeyHasher } from "./ports/key-hasher"
