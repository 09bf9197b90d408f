import type { KeyIndex } from "./key-index"

/** Keys compared with SameValueZero, as `Map` does. */
export class NativeKeyIndex<K, V> implements KeyIndex<K, V> {
  private readonly map = new Map<K, V>()

  get size(): number {
    return this.map.size
  }

  get(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
    this.map.set(key, value)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  clear(): void {
    this.map.clear()
  }
}
