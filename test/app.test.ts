import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest"
import type { FileMetadataPort } from "../src/application/ports/file-metadata.port"
import { BaseDirectoryResolver } from "../src/application/use-cases/resolve-base-directories"
import { RuntimeDirValidator } from "../src/application/use-cases/validate-runtime-dir"
import { App } from "../src/cli/app"
import { getHelpText } from "../src/cli/parser"
import { Presenter } from "../src/cli/presenter"
import { Result } from "../src/domain/shared/result"
import { RecordEnvironmentAdapter } from "../src/infrastructure/environment/record-environment.adapter"
import { PosixPlatformAdapter } from "../src/infrastructure/platform/posix-platform.adapter"

function appFor(variables: Record<string, string>, mode = 0o040700): App {
  const platform = new PosixPlatformAdapter(() => undefined)
  const metadata: FileMetadataPort = {
    stat: () => Result.ok({ isDirectory: true, uid: 1000, mode }),
    effectiveUid: () => 1000,
  }
  return new App({
    resolver: new BaseDirectoryResolver(
      new RecordEnvironmentAdapter(variables),
      platform,
    ),
    validator: new RuntimeDirValidator(metadata),
    platform,
  })
}

describe("App", () => {
  let log: MockInstance
  let error: MockInstance

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {})
    error = vi.spyOn(console, "error").mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("prints the requested values", () => {
    const app = appFor({ HOME: "/home/alice", XDG_DATA_DIRS: "/a:/b" })

    expect(app.run(["data-home", "data-dirs"])).toBe(0)
    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith(
      "XDG_DATA_HOME=/home/alice/.local/share\nXDG_DATA_DIRS=/a:/b",
    )
    expect(error).not.toHaveBeenCalled()
  })

  it("prints what resolves and fails on the rest", () => {
    const app = appFor({ HOME: "/home/alice" })

    expect(app.run([])).toBe(1)
    expect(log).toHaveBeenCalledWith(
      [
        "XDG_DATA_HOME=/home/alice/.local/share",
        "XDG_CONFIG_HOME=/home/alice/.config",
        "XDG_CACHE_HOME=/home/alice/.cache",
        "XDG_DATA_DIRS=/usr/local/share:/usr/share",
        "XDG_CONFIG_DIRS=/etc/xdg",
      ].join("\n"),
    )
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      "XDG_RUNTIME_DIR is not set to an absolute path",
    )
  })

  it("prints nothing to stdout when no value resolves", () => {
    expect(appFor({}).run(["cache-home"])).toBe(1)
    expect(log).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      "Cannot determine the home directory and XDG_CACHE_HOME is not set to an absolute path",
    )
  })

  it("prints JSON", () => {
    expect(appFor({}).run(["--format", "json", "config-dirs"])).toBe(0)
    expect(log).toHaveBeenCalledWith(
      JSON.stringify({ XDG_CONFIG_DIRS: ["/etc/xdg"] }, null, 2),
    )
  })

  it("reports a valid runtime directory", () => {
    const app = appFor({ XDG_RUNTIME_DIR: "/run/user/1000" })

    expect(app.run(["--check-runtime", "runtime-dir"])).toBe(0)
    expect(log).toHaveBeenCalledWith("XDG_RUNTIME_DIR=/run/user/1000")
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      new Presenter().describeRuntimeStatus("/run/user/1000", "valid"),
    )
  })

  it("fails the runtime check on an insecure directory", () => {
    const app = appFor({ XDG_RUNTIME_DIR: "/run/user/1000" }, 0o040755)

    expect(app.run(["--check-runtime", "runtime-dir"])).toBe(1)
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      new Presenter().describeRuntimeStatus(
        "/run/user/1000",
        "insecure-permissions",
      ),
    )
  })

  it("fails the runtime check when the variable is unset", () => {
    expect(appFor({}).run(["--check-runtime", "config-dirs"])).toBe(1)
    expect(log).toHaveBeenCalledWith("XDG_CONFIG_DIRS=/etc/xdg")
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      "XDG_RUNTIME_DIR is not set to an absolute path",
    )
  })

  it("reports a missing runtime directory once when also checking it", () => {
    const app = appFor({ HOME: "/home/alice" })

    expect(app.run(["--check-runtime"])).toBe(1)
    const runtimeErrors = error.mock.calls.filter(
      (args) => args[1] === "XDG_RUNTIME_DIR is not set to an absolute path",
    )
    expect(runtimeErrors).toHaveLength(1)
  })

  it("returns a usage error for unknown names", () => {
    expect(appFor({}).run(["bogus"])).toBe(2)
    expect(log).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      "Run 'xdg-basedir --help' for usage information.",
    )
  })

  it("prints help", () => {
    expect(appFor({}).run(["--help"])).toBe(0)
    expect(log).toHaveBeenCalledWith(getHelpText())
  })

  it("prints the version", () => {
    expect(appFor({}).run(["-v"])).toBe(0)
    expect(log).toHaveBeenCalledWith("xdg-basedir v1.0.0")
  })
})
