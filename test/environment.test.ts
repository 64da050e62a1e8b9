import { afterEach, describe, expect, it, vi } from "vitest"
import { ProcessEnvironmentAdapter } from "../src/infrastructure/environment/process-environment.adapter"
import { RecordEnvironmentAdapter } from "../src/infrastructure/environment/record-environment.adapter"

describe("RecordEnvironmentAdapter", () => {
  it("looks up variables from the record", () => {
    const env = new RecordEnvironmentAdapter({ XDG_DATA_HOME: "/data" })
    expect(env.get("XDG_DATA_HOME")).toBe("/data")
    expect(env.get("XDG_CACHE_HOME")).toBeUndefined()
  })

  it("treats undefined entries as unset", () => {
    const env = new RecordEnvironmentAdapter({ XDG_DATA_HOME: undefined })
    expect(env.get("XDG_DATA_HOME")).toBeUndefined()
  })

  it("does not see changes made to the record afterwards", () => {
    const variables: Record<string, string> = { XDG_DATA_HOME: "/before" }
    const env = new RecordEnvironmentAdapter(variables)
    variables.XDG_DATA_HOME = "/after"
    expect(env.get("XDG_DATA_HOME")).toBe("/before")
  })
})

describe("ProcessEnvironmentAdapter", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("reads the live process environment", () => {
    const env = new ProcessEnvironmentAdapter()
    vi.stubEnv("XDG_STATE_PROBE", "/first")
    expect(env.get("XDG_STATE_PROBE")).toBe("/first")
    vi.stubEnv("XDG_STATE_PROBE", "/second")
    expect(env.get("XDG_STATE_PROBE")).toBe("/second")
  })
})
