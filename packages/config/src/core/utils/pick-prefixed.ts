/**
 * Keys starting with `prefix`, with the prefix removed. Without a prefix,
 * a shallow copy of every key.
 */
export function pickPrefixed<T>(
  values: Readonly<Record<string, T>>,
  prefix: string | undefined,
): Record<string, T> {
  if (!prefix) return { ...values }

  const picked: Record<string, T> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) picked[key.slice(prefix.length)] = value
  }

  return picked
}
