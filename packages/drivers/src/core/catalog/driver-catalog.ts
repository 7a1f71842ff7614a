import type { DriverId } from "../../ports/registry"
import { compare } from "../registry/static-registry"

/**
 * Loaded driver modules, by identifier, for connection code to pick up.
 */
export class DriverCatalog {
  private readonly drivers = new Map<DriverId, unknown>()

  /**
   * Returns `false` when the driver was already registered; the first
   * module stays in place.
   */
  register(driverId: DriverId, driver: unknown): boolean {
    if (this.drivers.has(driverId)) return false

    this.drivers.set(driverId, driver)
    return true
  }

  has(driverId: DriverId): boolean {
    return this.drivers.has(driverId)
  }

  get(driverId: DriverId): unknown {
    return this.drivers.get(driverId)
  }

  ids(): DriverId[] {
    return [...this.drivers.keys()].sort(compare)
  }

  clear(): void {
    this.drivers.clear()
  }
}

/** Process-wide catalog used by `NodeModuleRuntime` unless one is injected. */
export const defaultDriverCatalog = new DriverCatalog()
