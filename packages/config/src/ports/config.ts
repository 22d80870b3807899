/**
 * Validated configuration.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ NUMBER_FALLBACK: z.enum(["lenient", "strict"]).default("lenient") }),
 *   sources: [new EnvSource({ prefix: "ATTRMAP_" })],
 * })
 *
 * config.get("NUMBER_FALLBACK")     // "lenient"
 * config.explain("NUMBER_FALLBACK") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that supplied at least one value */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know about */
  unknownKeys(): string[]
}
