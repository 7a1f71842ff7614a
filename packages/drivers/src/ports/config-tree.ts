import type { ConfigKey } from "./registry"

/**
 * One environment's database configuration, already parsed and with
 * variables substituted.
 *
 * Only the top-level `active` and `inactive` groups are read: each maps a
 * config key to that database's settings, which stay opaque here.
 *
 * @example
 * ```json
 * {
 *   "active": { "postgresql": { "host": "localhost", "port": 5432 } },
 *   "inactive": { "mysql": {} }
 * }
 * ```
 */
export type ConfigTree = Readonly<Record<string, unknown>>

/** Distinct active config keys, sorted. */
export type ActiveKeySet = readonly ConfigKey[]

export type ActiveKeyAnalysis = Readonly<{
  active: ActiveKeySet
  /** Keys only present in `inactive`, sorted. */
  inactive: readonly ConfigKey[]
  /** Keys present in both groups; these count as active. */
  ambiguous: readonly ConfigKey[]
}>

/**
 * Supplies the configuration tree for a named environment.
 */
export interface ConfigTreeProvider {
  load(environment: string): Promise<ConfigTree>
}
