import type { KeyHasher } from "../../ports/key-hasher"
import type { KeyIndex } from "./key-index"

type Slot<K, V> = {
  key: K
  value: V
}

/**
 * Keys compared through a caller-supplied {@link KeyHasher}.
 *
 * Each hash maps to a bucket of slots; colliding keys are told apart with
 * `equals`.
 */
export class HashedKeyIndex<K, V> implements KeyIndex<K, V> {
  private readonly buckets = new Map<string | number, Slot<K, V>[]>()
  private count = 0

  constructor(private readonly hasher: KeyHasher<K>) {}

  get size(): number {
    return this.count
  }

  get(key: K): V | undefined {
    return this.findSlot(key)?.value
  }

  set(key: K, value: V): void {
    const hash = this.hasher.hash(key)
    const bucket = this.buckets.get(hash)

    if (!bucket) {
      this.buckets.set(hash, [{ key, value }])
      this.count++
      return
    }

    const slot = bucket.find((candidate) => this.hasher.equals(candidate.key, key))

    if (slot) {
      slot.value = value
      return
    }

    bucket.push({ key, value })
    this.count++
  }

  has(key: K): boolean {
    return this.findSlot(key) !== undefined
  }

  delete(key: K): boolean {
    const hash = this.hasher.hash(key)
    const bucket = this.buckets.get(hash)
    if (!bucket) return false

    const at = bucket.findIndex((candidate) => this.hasher.equals(candidate.key, key))
    if (at === -1) return false

    bucket.splice(at, 1)
    if (bucket.length === 0) this.buckets.delete(hash)

    this.count--

    return true
  }

  clear(): void {
    this.buckets.clear()
    this.count = 0
  }

  private findSlot(key: K): Slot<K, V> | undefined {
    const bucket = this.buckets.get(this.hasher.hash(key))

    return bucket?.find((candidate) => this.hasher.equals(candidate.key, key))
  }
}
