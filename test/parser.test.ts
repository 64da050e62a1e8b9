import { describe, expect, it } from "vitest"
import { parseCliArgs } from "../src/cli/parser"

describe("parseCliArgs", () => {
  it("defaults to every kind in text format", () => {
    expect(parseCliArgs([])).toEqual({
      ok: true,
      value: {
        kinds: [
          "data-home",
          "config-home",
          "cache-home",
          "runtime-dir",
          "data-dirs",
          "config-dirs",
        ],
        format: "text",
        checkRuntime: false,
        help: false,
        version: false,
      },
    })
  })

  it("keeps requested kinds in order without duplicates", () => {
    const result = parseCliArgs(["config-dirs", "data-home", "config-dirs"])
    expect(result.ok && result.value.kinds).toEqual(["config-dirs", "data-home"])
  })

  it("accepts a short format flag", () => {
    const result = parseCliArgs(["-f", "json"])
    expect(result.ok && result.value.format).toBe("json")
  })

  it("accepts --check-runtime", () => {
    const result = parseCliArgs(["--check-runtime"])
    expect(result.ok && result.value.checkRuntime).toBe(true)
  })

  it("rejects an unknown format", () => {
    const result = parseCliArgs(["--format", "yaml"])
    expect(!result.ok && result.error.message).toBe(
      'Invalid format "yaml". Valid options: text, json, toml',
    )
  })

  it("rejects an unknown directory name", () => {
    const result = parseCliArgs(["state-home"])
    expect(!result.ok && result.error.message).toBe(
      'Unknown directory "state-home". Valid names: data-home, config-home, cache-home, runtime-dir, data-dirs, config-dirs',
    )
  })

  it("rejects unknown options", () => {
    const result = parseCliArgs(["--nope"])
    expect(!result.ok && result.error.name).toBe("CliParseError")
  })
})
