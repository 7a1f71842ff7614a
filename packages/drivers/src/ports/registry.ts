/** Name of a database under `active` / `inactive`, e.g. "postgresql". */
export type ConfigKey = string

/** Module specifier the runtime loads, e.g. "pg". */
export type DriverId = string

export type RegistryEntry = Readonly<{
  configKey: ConfigKey
  driverId: DriverId
  /** Package and version range that provides the driver, e.g. "pg@^8.13.1". */
  coordinate: string
  /** What an operator should do to make the driver available. */
  suggestion: string
}>

/**
 * Read-only mapping from configuration keys to drivers.
 *
 * A lookup miss is not an error: it is how unknown configuration keys are
 * detected, and callers must report it.
 */
export interface DriverRegistry {
  lookup(configKey: ConfigKey): RegistryEntry | undefined

  has(configKey: ConfigKey): boolean

  /** All entries, sorted by config key. */
  entries(): readonly RegistryEntry[]

  /** Entries whose driver is `driverId`, sorted by config key. */
  entriesForDriver(driverId: DriverId): readonly RegistryEntry[]
}
