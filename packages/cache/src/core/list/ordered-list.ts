/**
 * Handle to a position in an {@link OrderedList}.
 *
 * Stays valid while other nodes are inserted or removed; becomes detached
 * once it is removed itself or its list is cleared.
 */
export class ListNode<T> {
  /** @internal */
  prev: ListNode<T> | null = null
  /** @internal */
  next: ListNode<T> | null = null

  constructor(
    readonly item: T,
    /** @internal */
    public owner: object | null,
  ) {}
}

/**
 * Doubly-linked list with O(1) insertion and removal at both ends and O(1)
 * removal of any node handed out by this list.
 */
export class OrderedList<T> {
  private head: ListNode<T> | null = null
  private tail: ListNode<T> | null = null
  private length = 0

  // Nodes point at the generation that created them; clear() starts a new one.
  private generation: object = {}

  get size(): number {
    return this.length
  }

  isEmpty(): boolean {
    return this.length === 0
  }

  pushFront(item: T): ListNode<T> {
    const node = new ListNode(item, this.generation)
    this.linkFront(node)

    return node
  }

  pushBack(item: T): ListNode<T> {
    const node = new ListNode(item, this.generation)

    node.prev = this.tail
    if (this.tail) this.tail.next = node
    else this.head = node

    this.tail = node
    this.length++

    return node
  }

  popFront(): T | undefined {
    const node = this.head
    if (!node) return undefined

    this.unlink(node)

    return node.item
  }

  popBack(): T | undefined {
    const node = this.tail
    if (!node) return undefined

    this.unlink(node)

    return node.item
  }

  /**
   * Detach `node` from the list.
   *
   * Returns false, and changes nothing, if the node is not currently part
   * of this list.
   */
  remove(node: ListNode<T>): boolean {
    if (!this.owns(node)) return false

    this.unlink(node)

    return true
  }

  /**
   * Move `node` to the front, keeping the same handle.
   *
   * Returns false if the node is not currently part of this list.
   */
  moveToFront(node: ListNode<T>): boolean {
    if (!this.owns(node)) return false
    if (node === this.head) return true

    this.unlink(node)
    node.owner = this.generation
    this.linkFront(node)

    return true
  }

  clear(): void {
    this.head = null
    this.tail = null
    this.length = 0
    this.generation = {}
  }

  private owns(node: ListNode<T>): boolean {
    return node.owner === this.generation
  }

  private linkFront(node: ListNode<T>): void {
    node.prev = null
    node.next = this.head
    if (this.head) this.head.prev = node
    else this.tail = node

    this.head = node
    this.length++
  }

  private unlink(node: ListNode<T>): void {
    if (node.prev) node.prev.next = node.next
    else this.head = node.next

    if (node.next) node.next.prev = node.prev
    else this.tail = node.prev

    node.prev = null
    node.next = null
    node.owner = null
    this.length--
  }
}
