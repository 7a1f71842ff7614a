import type { DriverResolution, RequiredDriver } from "../../ports/outcome"
import type { ConfigKey, DriverId, DriverRegistry, RegistryEntry } from "../../ports/registry"
import { compare } from "../registry/static-registry"

/**
 * Map active keys to the distinct drivers they need.
 *
 * Keys sharing a driver collapse into one requirement; the coordinate and
 * suggestion come from the first of those keys in sort order. Keys the
 * registry does not know end up in `unknown`.
 */
export function resolveDrivers(
  keys: Iterable<ConfigKey>,
  registry: DriverRegistry,
): DriverResolution {
  const byDriver = new Map<DriverId, RegistryEntry[]>()
  const unknown: ConfigKey[] = []

  for (const key of [...new Set(keys)].sort(compare)) {
    const entry = registry.lookup(key)

    if (!entry) {
      unknown.push(key)
      continue
    }

    const entries = byDriver.get(entry.driverId)
    if (entries) entries.push(entry)
    else byDriver.set(entry.driverId, [entry])
  }

  const required: RequiredDriver[] = []

  for (const [driverId, entries] of byDriver) {
    const [origin] = entries
    if (!origin) continue

    required.push({
      driverId,
      configKeys: entries.map((e) => e.configKey),
      coordinate: origin.coordinate,
      suggestion: origin.suggestion,
    })
  }

  required.sort((a, b) => compare(a.driverId, b.driverId))

  return { required, unknown }
}
