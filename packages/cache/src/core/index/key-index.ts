import type { KeyHasher } from "../../ports/key-hasher"
import { HashedKeyIndex } from "./hashed-key-index"
import { NativeKeyIndex } from "./native-key-index"

/**
 * Map-like lookup from cache keys to their entries' list nodes.
 *
 * Internal to cache implementations: it never reorders or evicts.
 */
export interface KeyIndex<K, V> {
  get(key: K): V | undefined
  set(key: K, value: V): void
  has(key: K): boolean

  /** Returns true if the key was present. */
  delete(key: K): boolean

  clear(): void
  readonly size: number
}

export function createKeyIndex<K, V>(hasher?: KeyHasher<K>): KeyIndex<K, V> {
  if (hasher) return new HashedKeyIndex<K, V>(hasher)

  return new NativeKeyIndex<K, V>()
}
