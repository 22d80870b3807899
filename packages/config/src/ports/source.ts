/**
 * Loads raw configuration values. No validation or coercion happens here;
 * the schema handed to `loadConfig` does that.
 *
 * Sources are applied in order, later ones override earlier ones.
 */
export interface ConfigSource {
  /** Shown by `IConfig.explain`, e.g. "env" or "object:overrides" */
  readonly name: string

  /**
   * A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
