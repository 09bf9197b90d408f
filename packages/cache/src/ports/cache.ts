import type { CacheEvictionPolicy } from "./cache-eviction-policy"

/**
 * A bounded, synchronous, in-memory key/value cache.
 *
 * @remarks
 * - Capacity is a count of entries. When a new key is put into a full
 *   cache, one entry is evicted first according to {@link policy}.
 * - Lookups and inserts are O(1) on average for every policy.
 * - Not safe for concurrent mutation from multiple workers; share an
 *   instance only within one thread of execution.
 */
export interface Cache<K, V> {
  readonly policy: CacheEvictionPolicy

  getCapacity(): number

  /**
   * Replace the capacity.
   *
   * Shrinking below the current size evicts nothing immediately; the
   * next `put` of a new key evicts until the new entry fits.
   *
   * @throws InvalidCapacityError when `capacity` is not a non-negative safe integer.
   */
  setCapacity(capacity: number): void

  /**
   * Return the value stored for `key`.
   *
   * Depending on the policy this counts as a use of the entry (LRU moves
   * it to most-recent, LFU increments its frequency).
   *
   * @throws KeyNotFoundError when the key is not cached.
   */
  get(key: K): V

  /**
   * Insert or overwrite `key`. Never throws.
   */
  put(key: K, value: V): void

  /** Drop every entry. Capacity is unchanged. */
  clear(): void

  /** Number of live entries. */
  size(): number

  /**
   * Whether `key` is cached. Has no effect on ordering or frequency.
   */
  has(key: K): boolean
}
