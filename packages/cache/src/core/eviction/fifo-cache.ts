import type { CacheDeps, CacheOptions } from "../../ports/cache-options"
import { BaseCache } from "../base-cache"
import { type ListNode, OrderedList } from "../list/ordered-list"
import type { Entry } from "./entry"

/** Evicts in insertion order. Reads and overwrites do not reorder. */
export class FifoCache<K, V> extends BaseCache<K, V, ListNode<Entry<K, V>>> {
  private readonly entries = new OrderedList<Entry<K, V>>()

  constructor(deps: CacheDeps, opts: CacheOptions<K>) {
    super("fifo", deps, opts)
  }

  get(key: K): V {
    return this.lookup(key).item.value
  }

  put(key: K, value: V): void {
    if (this.getCapacity() === 0) return

    const node = this.index.get(key)
    if (node) {
      node.item.value = value
      return
    }

    this.makeRoom(() => this.entries.popFront())
    this.index.set(key, this.entries.pushBack({ key, value }))
  }

  protected reset(): void {
    this.entries.clear()
  }
}
