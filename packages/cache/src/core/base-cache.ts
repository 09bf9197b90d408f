import { createNullLogger, type Logger } from "@stowage/logger"
import type { Cache } from "../ports/cache"
import type { CacheEvictionPolicy } from "../ports/cache-eviction-policy"
import type { CacheDeps, CacheOptions } from "../ports/cache-options"
import { assertCapacity } from "./errors/invalid-capacity-error"
import { KeyNotFoundError } from "./errors/key-not-found-error"
import { createKeyIndex, type KeyIndex } from "./index/key-index"
import { loggableKey } from "./utils/loggable-key"

/**
 * Capacity bookkeeping, key index and logging shared by every policy.
 *
 * Subclasses own the eviction order: they keep `TNode` handles in
 * {@link index} and decide which entry goes when the cache is full.
 */
export abstract class BaseCache<K, V, TNode> implements Cache<K, V> {
  protected readonly index: KeyIndex<K, TNode>
  protected readonly logger: Logger
  private capacity: number

  protected constructor(
    readonly policy: CacheEvictionPolicy,
    deps: CacheDeps,
    opts: CacheOptions<K>,
  ) {
    assertCapacity(opts.capacity)

    this.capacity = opts.capacity
    this.index = createKeyIndex<K, TNode>(opts.hasher)
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "cache",
      policy,
      ...(opts.name !== undefined && { cacheName: opts.name }),
    })
  }

  abstract get(key: K): V
  abstract put(key: K, value: V): void

  /** Reset policy-specific ordering after the index has been emptied. */
  protected abstract reset(): void

  getCapacity(): number {
    return this.capacity
  }

  setCapacity(capacity: number): void {
    assertCapacity(capacity)

    const size = this.index.size
    if (capacity < size) {
      this.logger.warn("capacity below current size; eviction deferred to next insert", {
        capacity,
        size,
      })
    }

    this.capacity = capacity
  }

  clear(): void {
    const dropped = this.index.size

    this.index.clear()
    this.reset()

    this.logger.debug("cleared cache", { dropped })
  }

  size(): number {
    return this.index.size
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  protected lookup(key: K): TNode {
    const node = this.index.get(key)
    if (node === undefined) throw new KeyNotFoundError(key)

    return node
  }

  /**
   * Evict until one more entry fits.
   *
   * After a `setCapacity` shrink this takes several victims, leaving the
   * cache back within bounds once the caller inserts.
   */
  protected makeRoom(popVictim: () => { key: K } | undefined): void {
    while (this.index.size >= this.capacity) {
      const victim = popVictim()

      if (victim === undefined) {
        throw new Error(
          `Invariant violation: ${this.policy} cache has no eviction candidate while at capacity`,
        )
      }

      this.index.delete(victim.key)
      this.logger.debug("evicted entry", {
        reason: "capacity",
        key: loggableKey(victim.key),
        size: this.index.size,
        capacity: this.capacity,
      })
    }
  }
}
