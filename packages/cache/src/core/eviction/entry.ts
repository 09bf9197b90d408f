export type Entry<K, V> = {
  readonly key: K
  value: V
}

export type LfuEntry<K, V> = Entry<K, V> & {
  /** Number of gets and puts since insertion. Matches its bucket. */
  frequency: number
}
