import type { CacheDeps, CacheOptions } from "../../ports/cache-options"
import { BaseCache } from "../base-cache"
import { type ListNode, OrderedList } from "../list/ordered-list"
import type { LfuEntry } from "./entry"

/**
 * Least frequently used goes first; ties go to the entry that reached its
 * count least recently.
 *
 * Entries are grouped in one list per access count, newest first, and the
 * smallest count is tracked directly so eviction needs no heap or scan.
 */
export class LfuCache<K, V> extends BaseCache<K, V, ListNode<LfuEntry<K, V>>> {
  // Only non-empty buckets are kept.
  private readonly buckets = new Map<number, OrderedList<LfuEntry<K, V>>>()
  private minimalFreq = 0

  constructor(deps: CacheDeps, opts: CacheOptions<K>) {
    super("lfu", deps, opts)
  }

  get(key: K): V {
    const node = this.promote(this.lookup(key))

    return node.item.value
  }

  put(key: K, value: V): void {
    if (this.getCapacity() === 0) return

    const node = this.index.get(key)
    if (node) {
      this.promote(node).item.value = value
      return
    }

    this.makeRoom(() => this.popLeastFrequent())

    this.minimalFreq = 1
    this.index.set(key, this.bucket(1).pushFront({ key, value, frequency: 1 }))
  }

  /** Access count of `key`, or `undefined` when it is not cached. */
  frequencyOf(key: K): number | undefined {
    return this.index.get(key)?.item.frequency
  }

  protected reset(): void {
    this.buckets.clear()
    this.minimalFreq = 0
  }

  private promote(node: ListNode<LfuEntry<K, V>>): ListNode<LfuEntry<K, V>> {
    const entry = node.item
    const from = entry.frequency
    const bucket = this.buckets.get(from)

    bucket?.remove(node)
    if (bucket?.isEmpty()) {
      this.buckets.delete(from)
      if (this.minimalFreq === from) this.minimalFreq = from + 1
    }

    entry.frequency = from + 1
    const moved = this.bucket(entry.frequency).pushFront(entry)
    this.index.set(entry.key, moved)

    return moved
  }

  private popLeastFrequent(): LfuEntry<K, V> | undefined {
    if (this.buckets.size === 0) return undefined

    // Only reachable while evicting down after a setCapacity shrink: an
    // earlier victim in the same put emptied the minimal bucket.
    if (!this.buckets.has(this.minimalFreq)) {
      this.minimalFreq = this.lowestFrequency()
    }

    const bucket = this.buckets.get(this.minimalFreq)
    const victim = bucket?.popBack()

    if (bucket?.isEmpty()) this.buckets.delete(this.minimalFreq)

    return victim
  }

  private lowestFrequency(): number {
    let lowest = Number.POSITIVE_INFINITY

    for (const frequency of this.buckets.keys()) {
      if (frequency < lowest) lowest = frequency
    }

    return lowest
  }

  private bucket(frequency: number): OrderedList<LfuEntry<K, V>> {
    let list = this.buckets.get(frequency)

    if (!list) {
      list = new OrderedList()
      this.buckets.set(frequency, list)
    }

    return list
  }
}
