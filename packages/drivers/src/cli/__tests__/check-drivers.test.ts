import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Writable } from "node:stream"
import { NullLogger } from "@driverwright/logger"
import { MemoryDriverRuntime } from "../../adapters/memory/memory-driver-runtime"
import { INACTIVE_REMINDER } from "../../core/report/format-report"
import { ExitCode, runCheckDrivers } from "../check-drivers"
import { USAGE } from "../parse-args"

function capture() {
  const chunks: string[] = []

  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(chunk.toString("utf8"))
      callback()
    },
  })

  return { stream, text: () => chunks.join("") }
}

type Capture = ReturnType<typeof capture>

describe("check-drivers", () => {
  let cwd: string
  let stdout: Capture
  let stderr: Capture
  let runtime: MemoryDriverRuntime

  async function writeConfig(env: string, tree: unknown, dir = "conf") {
    await fs.mkdir(path.join(cwd, dir, env), { recursive: true })
    await fs.writeFile(path.join(cwd, dir, env, "config.json"), JSON.stringify(tree))
  }

  function run(argv: string[], env: Record<string, string> = {}) {
    return runCheckDrivers(argv, {
      stdout: stdout.stream,
      stderr: stderr.stream,
      env,
      cwd,
      runtime,
      logger: new NullLogger(),
    })
  }

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "check-drivers-"))
    stdout = capture()
    stderr = capture()
    runtime = new MemoryDriverRuntime()
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("prints the report and succeeds when every driver is available", async () => {
    runtime.install("pg")
    await writeConfig("dev", { active: { postgresql: { host: "localhost" } }, inactive: { mysql: {} } })

    expect(await run([])).toBe(ExitCode.Ok)
    expect(stdout.text()).toBe(
      [
        'Database drivers for environment "dev": 1 loaded, 0 failed, 0 unknown',
        "",
        "Loaded:",
        "  - pg",
        "",
      ].join("\n"),
    )
    expect(runtime.catalog.ids()).toEqual([])
  })

  it("fails with install suggestions for missing drivers", async () => {
    await writeConfig("dev", { active: { mysql: {} } })

    expect(await run([])).toBe(ExitCode.DriversMissing)
    expect(stdout.text()).toContain("  - mysql2 (driver_unavailable: Cannot find module 'mysql2')\n")
    expect(stdout.text()).toContain("    npm install mysql2@^3.11.5\n")
    expect(stdout.text().endsWith(`${INACTIVE_REMINDER}\n`)).toBe(true)
  })

  it("fails on unknown keys and lists the supported ones", async () => {
    await writeConfig("dev", { active: { mongodb: {} } })

    expect(await run([])).toBe(ExitCode.DriversMissing)
    expect(stdout.text()).toContain("  Supported keys: mssql, mysql, postgresql, sqlite\n")
  })

  it("writes JSON when asked", async () => {
    runtime.install("pg")
    await writeConfig("dev", { active: { postgresql: {} } })

    await run(["--format", "json"])

    expect(JSON.parse(stdout.text())).toEqual({
      environment: "dev",
      mode: "validate",
      success: true,
      loaded: ["pg"],
      failed: [],
      unknown: [],
    })
  })

  it("loads and registers drivers with --load", async () => {
    runtime.install("better-sqlite3")
    await writeConfig("dev", { active: { sqlite: {} } })

    expect(await run(["--load", "--format", "json"])).toBe(ExitCode.Ok)
    expect(JSON.parse(stdout.text())).toMatchObject({ mode: "load", loaded: ["better-sqlite3"] })
    expect(runtime.catalog.ids()).toEqual(["better-sqlite3"])
  })

  it("picks the environment from the flag over the process variables", async () => {
    runtime.install("mssql")
    await writeConfig("prod", { active: { mssql: {} } })

    expect(await run(["--env", "prod"], { ENV: "staging" })).toBe(ExitCode.Ok)
    expect(stdout.text()).toContain('environment "prod"')
  })

  it("picks the environment from the process variables", async () => {
    await writeConfig("staging", {})

    expect(await run([], { ENVIRONMENT: "staging" })).toBe(ExitCode.Ok)
    expect(stdout.text()).toBe(
      'Database drivers for environment "staging": 0 loaded, 0 failed, 0 unknown\n',
    )
  })

  it("reads from another configuration directory", async () => {
    await writeConfig("dev", { active: {} }, "settings")

    expect(await run(["--config-dir", "settings"])).toBe(ExitCode.Ok)
  })

  it("exits 2 when the configuration is missing", async () => {
    expect(await run(["--env", "qa"])).toBe(ExitCode.ConfigError)
    expect(stderr.text()).toBe(
      `Configuration file not found: ${path.join(cwd, "conf", "qa", "config.json")}\n`,
    )
    expect(stdout.text()).toBe("")
  })

  it("exits 2 on invalid settings", async () => {
    expect(await run([], { LOG_LEVEL: "chatty" })).toBe(ExitCode.ConfigError)
    expect(stderr.text()).toMatch(/^Configuration validation failed:/)
  })

  it("exits 2 with usage on bad arguments", async () => {
    expect(await run(["--nope"])).toBe(ExitCode.ConfigError)
    expect(stderr.text()).toBe(`Unknown option: --nope\n\n${USAGE}`)
  })

  it("prints usage for --help", async () => {
    expect(await run(["--help"])).toBe(ExitCode.Ok)
    expect(stdout.text()).toBe(USAGE)
  })

  it("keeps prettified logs out of the JSON report", async () => {
    await writeConfig("dev", { active: { mongodb: {} } })

    const code = await runCheckDrivers(["--format", "json"], {
      stdout: stdout.stream,
      stderr: stderr.stream,
      env: { LOG_PRETTY: "true" },
      cwd,
      runtime,
    })

    expect(code).toBe(ExitCode.DriversMissing)
    expect(JSON.parse(stdout.text())).toEqual({
      environment: "dev",
      mode: "validate",
      success: true,
      loaded: [],
      failed: [],
      unknown: ["mongodb"],
    })
    await vi.waitFor(() => expect(stderr.text()).toContain("Validated database drivers"))
  })
})
