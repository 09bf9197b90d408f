import type { Logger } from "@stowage/logger"
import type { KeyHasher } from "./key-hasher"

export type CacheOptions<K> = {
  /**
   * Maximum number of entries retained in the cache.
   *
   * Must be a non-negative safe integer. A capacity of 0 makes every
   * `put` a no-op.
   */
  capacity: number

  /**
   * Key hash/equality. Defaults to `Map` semantics (SameValueZero), which
   * compares objects by reference.
   */
  hasher?: KeyHasher<K>

  /** Included in every log entry as `cacheName`. */
  name?: string
}

export type CacheDeps = {
  /** Defaults to a no-op logger. */
  logger?: Logger
}
