/**
 * Hash/equality pair used to index keys that `Map` cannot compare by value
 * (tuples, records, class instances).
 *
 * @remarks
 * Must be consistent: `equals(a, b)` implies `hash(a) === hash(b)`. Collisions
 * are allowed and resolved with `equals`; a poor hash only costs speed.
 *
 * @example
 * ```ts
 * const pointHasher: KeyHasher<{ x: number; y: number }> = {
 *   hash: (p) => `${p.x},${p.y}`,
 *   equals: (a, b) => a.x === b.x && a.y === b.y,
 * }
 * ```
 */
export interface KeyHasher<K> {
  hash(key: K): string | number
  equals(a: K, b: K): boolean
}
