import type { Cache } from "../ports/cache"
import type { CacheEvictionPolicy } from "../ports/cache-eviction-policy"
import type { CacheDeps, CacheOptions } from "../ports/cache-options"
import { FifoCache } from "./eviction/fifo-cache"
import { FiloCache } from "./eviction/filo-cache"
import { LfuCache } from "./eviction/lfu-cache"
import { LruCache } from "./eviction/lru-cache"

/**
 * Build a cache for `policy`.
 *
 * @example
 * ```ts
 * const sessions = createCache<string, Session>("lru", { capacity: 500 }, { logger })
 * ```
 */
export function createCache<K, V>(
  policy: CacheEvictionPolicy,
  opts: CacheOptions<K>,
  deps: CacheDeps = {},
): Cache<K, V> {
  switch (policy) {
    case "filo":
      return new FiloCache<K, V>(deps, opts)
    case "fifo":
      return new FifoCache<K, V>(deps, opts)
    case "lru":
      return new LruCache<K, V>(deps, opts)
    case "lfu":
      return new LfuCache<K, V>(deps, opts)
    default: {
      const unknownPolicy: never = policy
      throw new Error(`Unknown cache eviction policy: ${String(unknownPolicy)}`)
    }
  }
}
