/**
 * First In, Last Out (FILO) eviction policy.
 *
 * A bounded stack: when full, the most recently inserted entry is evicted
 * to make room for the new one. Older entries are never displaced.
 */
export type FiloCacheEvictionPolicy = "filo"

/**
 * First In, First Out (FIFO) eviction policy.
 *
 * Evicts entries in insertion order, regardless of access patterns.
 * Overwriting a key does not change its position.
 */
export type FifoCacheEvictionPolicy = "fifo"

/**
 * Least Recently Used (LRU) eviction policy.
 *
 * Evicts the entry that has not been read or written for the longest time.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * Least Frequently Used (LFU) eviction policy.
 *
 * Evicts the entry with the fewest reads and writes; among equals, the one
 * that reached that count least recently.
 */
export type LfuCacheEvictionPolicy = "lfu"

export type CacheEvictionPolicy =
  | FiloCacheEvictionPolicy
  | FifoCacheEvictionPolicy
  | LruCacheEvictionPolicy
  | LfuCacheEvictionPolicy

export const cacheEvictionPolicies = [
  "filo",
  "fifo",
  "lru",
  "lfu",
] as const satisfies readonly CacheEvictionPolicy[]
