/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     REPLACER_NUM_FRAMES: z.coerce.number().int().positive().default(64),
 *     REPLACER_K: z.coerce.number().int().positive().default(2),
 *   }),
 *   sources: [new EnvSource()],
 * })
 *
 * config.get("REPLACER_K")          // 2
 * config.explain("REPLACER_K")      // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g. "env", "object:overrides", or "default" for Zod defaults).
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns the names of all sources that contributed at least one value,
   * in the order they were applied.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos such as `REPLACER_KK`.
   */
  unknownKeys(): string[]
}
