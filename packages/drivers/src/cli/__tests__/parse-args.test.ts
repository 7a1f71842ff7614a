import { CliUsageError, parseArgs } from "../parse-args"

describe("parseArgs", () => {
  it("defaults to a text validation run", () => {
    expect(parseArgs([])).toEqual({ load: false, format: "text", help: false })
  })

  it("reads every option", () => {
    expect(
      parseArgs(["--env", "prod", "--config-dir", "settings", "--load", "--format", "json"]),
    ).toEqual({ env: "prod", configDir: "settings", load: true, format: "json", help: false })
  })

  it.each([["--help"], ["-h"]])("recognises %s", (flag) => {
    expect(parseArgs([flag]).help).toBe(true)
  })

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--verbose"])).toThrow(new CliUsageError("Unknown option: --verbose"))
  })

  it("rejects a flag without its value", () => {
    expect(() => parseArgs(["--env"])).toThrow("--env needs a value")
    expect(() => parseArgs(["--env", "--load"])).toThrow("--env needs a value")
  })

  it("rejects an unsupported format", () => {
    expect(() => parseArgs(["--format", "yaml"])).toThrow(
      '--format must be "text" or "json", got "yaml"',
    )
  })
})
