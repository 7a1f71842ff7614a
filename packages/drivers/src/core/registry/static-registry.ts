import type { ConfigKey, DriverId, DriverRegistry, RegistryEntry } from "../../ports/registry"
import { RegistryError } from "../errors"

export type DriverDefinition = {
  configKey: ConfigKey
  driverId: DriverId
  /** Version range operators should install. */
  version: string
  /** npm package providing the driver, when it differs from the driver id. */
  packageName?: string
}

export function defineDriver(def: DriverDefinition): RegistryEntry {
  const packageName = def.packageName ?? def.driverId
  const coordinate = `${packageName}@${def.version}`

  return Object.freeze({
    configKey: def.configKey,
    driverId: def.driverId,
    coordinate,
    suggestion: `npm install ${coordinate}`,
  })
}

export class StaticDriverRegistry implements DriverRegistry {
  private readonly byKey: ReadonlyMap<ConfigKey, RegistryEntry>
  private readonly sorted: readonly RegistryEntry[]

  constructor(entries: Iterable<RegistryEntry>) {
    const byKey = new Map<ConfigKey, RegistryEntry>()

    for (const entry of entries) {
      assertEntry(entry)

      if (byKey.has(entry.configKey)) {
        throw new RegistryError(`Config key "${entry.configKey}" is registered twice`, {
          code: "duplicate_config_key",
          context: { configKey: entry.configKey },
          isOperational: false,
        })
      }

      byKey.set(entry.configKey, Object.freeze({ ...entry }))
    }

    this.byKey = byKey
    this.sorted = Object.freeze(
      [...byKey.values()].sort((a, b) => compare(a.configKey, b.configKey)),
    )
  }

  lookup(configKey: ConfigKey): RegistryEntry | undefined {
    return this.byKey.get(configKey)
  }

  has(configKey: ConfigKey): boolean {
    return this.byKey.has(configKey)
  }

  entries(): readonly RegistryEntry[] {
    return this.sorted
  }

  entriesForDriver(driverId: DriverId): readonly RegistryEntry[] {
    return this.sorted.filter((e) => e.driverId === driverId)
  }
}

function assertEntry(entry: RegistryEntry): void {
  const blank = (["configKey", "driverId", "coordinate", "suggestion"] as const).filter(
    (field) => entry[field].trim() === "",
  )

  if (blank.length > 0) {
    throw new RegistryError(`Registry entry has empty fields: ${blank.join(", ")}`, {
      code: "invalid_registry_entry",
      context: { entry, fields: blank },
      isOperational: false,
    })
  }
}

export function compare(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
