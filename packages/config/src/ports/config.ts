/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```typescript
 * const settings = await loadConfig({
 *   schema: z.object({ LOG_LEVEL: z.enum(logLevelNames).default("info") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * settings.value.LOG_LEVEL     // "debug"
 * settings.explain("LOG_LEVEL") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`,
   * or "default" when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys provided by sources but not declared by the schema. */
  extras(): string[]
}
