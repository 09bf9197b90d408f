import type { CacheDeps, CacheOptions } from "../../ports/cache-options"
import { BaseCache } from "../base-cache"
import { type ListNode, OrderedList } from "../list/ordered-list"
import type { Entry } from "./entry"

/**
 * Least recently used goes first.
 *
 * The list runs from most to least recently used; both `get` and `put`
 * count as a use.
 */
export class LruCache<K, V> extends BaseCache<K, V, ListNode<Entry<K, V>>> {
  private readonly entries = new OrderedList<Entry<K, V>>()

  constructor(deps: CacheDeps, opts: CacheOptions<K>) {
    super("lru", deps, opts)
  }

  get(key: K): V {
    const node = this.lookup(key)
    this.entries.moveToFront(node)

    return node.item.value
  }

  put(key: K, value: V): void {
    if (this.getCapacity() === 0) return

    const node = this.index.get(key)
    if (node) {
      node.item.value = value
      this.entries.moveToFront(node)
      return
    }

    this.makeRoom(() => this.entries.popBack())
    this.index.set(key, this.entries.pushFront({ key, value }))
  }

  protected reset(): void {
    this.entries.clear()
  }
}
