/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* raw configuration.
 * It does not perform validation, coercion, or merging.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.defaults", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * Returning undefined for a key means "value not provided".
   * Coercion and validation happen downstream in the schema.
   */
  load(): Promise<Record<string, unknown>>
}
