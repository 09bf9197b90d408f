/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     CACHE_POLICY: z.enum(["fifo", "lru"]).default("lru"),
 *     CACHE_CAPACITY: z.coerce.number().int().min(0),
 *   }),
 *   sources: [new DotenvSource({ path: ".env", optional: true }), new EnvSource()],
 * })
 *
 * config.get("CACHE_CAPACITY")   // 500
 * config.explain("CACHE_POLICY") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /** Typed access to a single validated value. */
  get<K extends keyof T & string>(key: K): T[K]

  /** Keys of the validated config object. */
  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g. "env", "dotenv:.env"), or "default" when
   * the value came from a schema default.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Names of all sources that contributed at least one value, in the
   * order they were applied.
   */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos and stale settings.
   */
  unknownKeys(): string[]
}
