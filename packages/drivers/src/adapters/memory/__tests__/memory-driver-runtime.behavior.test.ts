import { MemoryDriverRuntime } from "../memory-driver-runtime"

describe("MemoryDriverRuntime (behavior)", () => {
  it("uses a catalog of its own by default", () => {
    const a = new MemoryDriverRuntime({}, { modules: { pg: {} } })
    const b = new MemoryDriverRuntime()

    a.load("pg")

    expect(a.catalog.ids()).toEqual(["pg"])
    expect(b.catalog.ids()).toEqual([])
  })

  it("registers the installed module", () => {
    const runtime = new MemoryDriverRuntime()
    const driver = { connect: () => "connected" }

    runtime.install("mssql", driver)
    runtime.load("mssql")

    expect(runtime.catalog.get("mssql")).toBe(driver)
  })

  it("installs a placeholder module when none is given", () => {
    const runtime = new MemoryDriverRuntime()

    runtime.install("pg")
    runtime.load("pg")

    expect(runtime.catalog.get("pg")).toEqual({ driverId: "pg" })
  })

  it("mimics the module system's not-found error", () => {
    const result = new MemoryDriverRuntime().resolve("pg")

    expect(result.ok).toBe(false)
    if (result.ok) return

    expect(result.error).toBeInstanceOf(Error)
    expect(result.error).toMatchObject({
      message: "Cannot find module 'pg'",
      code: "MODULE_NOT_FOUND",
    })
  })

  it("returns the configured error for broken drivers", () => {
    const error = new Error("bad build")
    const runtime = new MemoryDriverRuntime({}, { broken: { pg: error } })

    expect(runtime.load("pg")).toEqual({ ok: false, kind: "driver_load_error", error })
  })

  it("counts evaluations, not calls", () => {
    const runtime = new MemoryDriverRuntime({}, { modules: { pg: {} } })

    runtime.resolve("pg")
    runtime.load("pg")
    runtime.load("pg")

    expect(runtime.loadCount("pg")).toBe(1)
  })

  it("can break, repair and uninstall drivers", () => {
    const runtime = new MemoryDriverRuntime({}, { modules: { pg: {} } })

    runtime.breakDriver("pg", new Error("bad build"))
    expect(runtime.load("pg")).toMatchObject({ kind: "driver_load_error" })

    runtime.install("pg")
    expect(runtime.load("pg")).toEqual({ ok: true })

    runtime.uninstall("pg")
    expect(runtime.resolve("pg")).toMatchObject({ kind: "driver_unavailable" })
  })
})
