import { createRequire } from "node:module"
import path from "node:path"
import { defaultDriverCatalog, type DriverCatalog } from "../../core/catalog/driver-catalog"
import type { DriverRuntime, RuntimeResult } from "../../ports/driver-runtime"
import type { DriverId } from "../../ports/registry"

export type NodeModuleRuntimeDeps = {
  /** @default defaultDriverCatalog */
  catalog?: DriverCatalog
}

export type NodeModuleRuntimeOptions = {
  /**
   * Directory whose `node_modules` chain drivers are resolved from.
   * Drivers are dependencies of the application, not of this package.
   *
   * @default process.cwd()
   */
  basedir?: string
}

/**
 * Finds drivers with Node's CommonJS resolution. `resolve` only walks the
 * filesystem; `load` evaluates the module and registers its exports.
 */
export class NodeModuleRuntime implements DriverRuntime {
  private readonly catalog: DriverCatalog
  private readonly require: NodeJS.Require

  constructor(deps: NodeModuleRuntimeDeps = {}, opts: NodeModuleRuntimeOptions = {}) {
    this.catalog = deps.catalog ?? defaultDriverCatalog
    this.require = createRequire(path.join(opts.basedir ?? process.cwd(), "package.json"))
  }

  resolve(driverId: DriverId): RuntimeResult {
    try {
      this.require.resolve(driverId)
      return { ok: true }
    } catch (error) {
      return {
        ok: false,
        kind: isModuleNotFound(error) ? "driver_unavailable" : "driver_load_error",
        error,
      }
    }
  }

  load(driverId: DriverId): RuntimeResult {
    if (this.catalog.has(driverId)) return { ok: true }

    const resolved = this.resolve(driverId)
    if (!resolved.ok) return resolved

    try {
      this.catalog.register(driverId, this.require(driverId))
      return { ok: true }
    } catch (error) {
      return { ok: false, kind: "driver_load_error", error }
    }
  }
}

function isModuleNotFound(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, "code") === "MODULE_NOT_FOUND"
}
