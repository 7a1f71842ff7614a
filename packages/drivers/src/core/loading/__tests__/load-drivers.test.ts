import type { Logger } from "@driverwright/logger"
import { mock } from "vitest-mock-extended"
import { MemoryDriverRuntime } from "../../../adapters/memory/memory-driver-runtime"
import type { DriverRuntime } from "../../../ports/driver-runtime"
import { makeRegistry } from "../../__tests__/registry-fixture"
import { resolveDrivers } from "../../resolution/resolve-drivers"
import { loadDrivers, probeDrivers } from "../load-drivers"

describe("loadDrivers", () => {
  const registry = makeRegistry()
  const resolution = resolveDrivers(["sqlite", "postgresql", "mysql"], registry)

  it("loads and registers every available driver", () => {
    const runtime = new MemoryDriverRuntime({}, {
      modules: { "better-sqlite3": { name: "sqlite" }, pg: { name: "pg" }, mysql2: { name: "mysql" } },
    })

    const outcome = loadDrivers(resolution, { runtime })

    expect(outcome).toEqual({
      success: true,
      loaded: ["better-sqlite3", "mysql2", "pg"],
      failed: [],
      unknown: [],
    })
    expect(runtime.catalog.get("pg")).toEqual({ name: "pg" })
  })

  it("keeps going after an unavailable driver", () => {
    const runtime = new MemoryDriverRuntime({}, { modules: { "better-sqlite3": {}, pg: {} } })

    const outcome = loadDrivers(resolution, { runtime })

    expect(outcome.success).toBe(false)
    expect(outcome.loaded).toEqual(["better-sqlite3", "pg"])
    expect(outcome.failed).toEqual([
      {
        driverId: "mysql2",
        configKeys: ["mysql"],
        cause: "driver_unavailable",
        message: "Cannot find module 'mysql2'",
        coordinate: "mysql2@^3.11.5",
        suggestion: "npm install mysql2@^3.11.5",
      },
    ])
  })

  it("reports a driver that fails to evaluate as a load error", () => {
    const runtime = new MemoryDriverRuntime(
      {},
      {
        modules: { "better-sqlite3": {}, mysql2: {} },
        broken: { pg: new Error("Cannot find module 'pg-native'\nRequire stack:\n- pg/lib/native") },
      },
    )

    const outcome = loadDrivers(resolution, { runtime })

    expect(outcome.loaded).toEqual(["better-sqlite3", "mysql2"])
    expect(outcome.failed).toEqual([
      expect.objectContaining({
        driverId: "pg",
        cause: "driver_load_error",
        message: "Cannot find module 'pg-native'",
        suggestion: "npm install pg@^8.13.1",
      }),
    ])
    expect(runtime.catalog.has("pg")).toBe(false)
  })

  it("turns a throwing runtime into a load error", () => {
    const runtime: DriverRuntime = {
      resolve: () => ({ ok: true }),
      load: () => {
        throw "native binding exploded"
      },
    }

    const outcome = loadDrivers(resolveDrivers(["sqlite"], registry), { runtime })

    expect(outcome.failed).toEqual([
      expect.objectContaining({
        driverId: "better-sqlite3",
        cause: "driver_load_error",
        message: "native binding exploded",
      }),
    ])
  })

  it("copies unknown keys from the resolution", () => {
    const runtime = new MemoryDriverRuntime()

    const outcome = loadDrivers(resolveDrivers(["mongodb"], registry), { runtime })

    expect(outcome).toEqual({ success: true, loaded: [], failed: [], unknown: ["mongodb"] })
  })

  it("loads a driver only once across calls", () => {
    const runtime = new MemoryDriverRuntime({}, { modules: { pg: {} } })
    const pgOnly = resolveDrivers(["postgresql", "postgres"], registry)

    const first = loadDrivers(pgOnly, { runtime })
    const second = loadDrivers(pgOnly, { runtime })

    expect(first).toEqual(second)
    expect(runtime.loadCount("pg")).toBe(1)
  })

  it("logs a summary and the failures", () => {
    const logger = mock<Logger>()
    const runtime = new MemoryDriverRuntime({}, { modules: { "better-sqlite3": {} } })

    loadDrivers(resolution, { runtime, logger })

    expect(logger.info).toHaveBeenCalledWith("Loaded database drivers", {
      requiredCount: 3,
      loadedCount: 1,
      failedCount: 2,
      unknownCount: 0,
    })
    expect(logger.error).toHaveBeenCalledWith("Required database drivers are not available", {
      failed: [
        expect.objectContaining({ driverId: "mysql2" }),
        expect.objectContaining({ driverId: "pg" }),
      ],
    })
  })

  it("warns about load errors with the original error", () => {
    const logger = mock<Logger>()
    const error = new Error("bad build")
    const runtime = new MemoryDriverRuntime({}, { broken: { "better-sqlite3": error } })

    loadDrivers(resolveDrivers(["sqlite"], registry), { runtime, logger })

    expect(logger.warn).toHaveBeenCalledWith("Database driver was found but failed to load", {
      driverId: "better-sqlite3",
      err: error,
    })
  })
})

describe("probeDrivers", () => {
  const registry = makeRegistry()
  const resolution = resolveDrivers(["sqlite", "postgresql", "mysql", "mongodb"], registry)

  it("partitions drivers without loading them", () => {
    const runtime = new MemoryDriverRuntime({}, { modules: { "better-sqlite3": {}, pg: {} } })

    const outcome = probeDrivers(resolution, { runtime })

    expect(outcome.loaded).toEqual(["better-sqlite3", "pg"])
    expect(outcome.failed.map((f) => [f.driverId, f.cause])).toEqual([
      ["mysql2", "driver_unavailable"],
    ])
    expect(outcome.unknown).toEqual(["mongodb"])
    expect(runtime.loadCount("pg")).toBe(0)
    expect(runtime.catalog.ids()).toEqual([])
  })

  it("matches the loaded partition for installed and missing drivers", () => {
    const probed = probeDrivers(resolution, {
      runtime: new MemoryDriverRuntime({}, { modules: { pg: {} } }),
    })
    const loaded = loadDrivers(resolution, {
      runtime: new MemoryDriverRuntime({}, { modules: { pg: {} } }),
    })

    expect(probed).toEqual(loaded)
  })

  it("cannot see drivers that only fail while loading", () => {
    const runtime = new MemoryDriverRuntime({}, { broken: { pg: new Error("bad build") } })

    expect(probeDrivers(resolveDrivers(["postgresql"], registry), { runtime }).success).toBe(true)
    expect(loadDrivers(resolveDrivers(["postgresql"], registry), { runtime }).success).toBe(false)
  })

  it("logs a validation summary", () => {
    const logger = mock<Logger>()

    probeDrivers(resolution, { runtime: new MemoryDriverRuntime(), logger })

    expect(logger.info).toHaveBeenCalledWith("Validated database drivers", {
      requiredCount: 3,
      availableCount: 0,
      missingCount: 3,
      unknownCount: 1,
    })
  })
})
