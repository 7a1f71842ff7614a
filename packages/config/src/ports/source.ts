/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and merging happen in `loadConfig`.
 * When several sources are given, later ones override earlier ones.
 */
export interface ConfigSource {
  /**
   * Provenance label, e.g. "env", "dotenv:.env", "json:conf/dev/config.json".
   */
  readonly name: string

  /**
   * Env and dotenv sources return flat strings, JSON sources may return
   * nested objects. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
