import { DriverCatalog } from "../../core/catalog/driver-catalog"
import type { DriverRuntime, RuntimeResult } from "../../ports/driver-runtime"
import type { DriverId } from "../../ports/registry"

export type MemoryDriverRuntimeDeps = {
  /** @default a fresh catalog, so tests never touch the process-wide one */
  catalog?: DriverCatalog
}

export type MemoryDriverRuntimeOptions = {
  /** Drivers that resolve and load, with the module each one exports. */
  modules?: Record<DriverId, unknown>
  /** Drivers that resolve but throw the given error when loaded. */
  broken?: Record<DriverId, Error>
}

/**
 * In-process stand-in for the module system, for tests and for embedders
 * that bundle their drivers.
 */
export class MemoryDriverRuntime implements DriverRuntime {
  readonly catalog: DriverCatalog
  private readonly modules = new Map<DriverId, unknown>()
  private readonly broken = new Map<DriverId, Error>()
  private readonly loads = new Map<DriverId, number>()

  constructor(deps: MemoryDriverRuntimeDeps = {}, opts: MemoryDriverRuntimeOptions = {}) {
    this.catalog = deps.catalog ?? new DriverCatalog()

    for (const [id, mod] of Object.entries(opts.modules ?? {})) this.install(id, mod)
    for (const [id, err] of Object.entries(opts.broken ?? {})) this.breakDriver(id, err)
  }

  install(driverId: DriverId, driver: unknown = { driverId }): void {
    this.broken.delete(driverId)
    this.modules.set(driverId, driver)
  }

  breakDriver(driverId: DriverId, error: Error): void {
    this.modules.delete(driverId)
    this.broken.set(driverId, error)
  }

  uninstall(driverId: DriverId): void {
    this.modules.delete(driverId)
    this.broken.delete(driverId)
  }

  /** How many times `driverId` was evaluated by `load`. */
  loadCount(driverId: DriverId): number {
    return this.loads.get(driverId) ?? 0
  }

  resolve(driverId: DriverId): RuntimeResult {
    if (this.modules.has(driverId) || this.broken.has(driverId)) return { ok: true }

    return {
      ok: false,
      kind: "driver_unavailable",
      error: Object.assign(new Error(`Cannot find module '${driverId}'`), {
        code: "MODULE_NOT_FOUND",
      }),
    }
  }

  load(driverId: DriverId): RuntimeResult {
    if (this.catalog.has(driverId)) return { ok: true }

    const resolved = this.resolve(driverId)
    if (!resolved.ok) return resolved

    this.loads.set(driverId, this.loadCount(driverId) + 1)

    const error = this.broken.get(driverId)
    if (error) return { ok: false, kind: "driver_load_error", error }

    this.catalog.register(driverId, this.modules.get(driverId))
    return { ok: true }
  }
}
