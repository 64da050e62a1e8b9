import type { EnvironmentPort } from "../ports/environment.port"
import type { PlatformPort } from "../ports/platform.port"
import { Result } from "../../domain/shared/result"
import { BaseDirectory } from "../../domain/xdg/value-objects/base-directory.vo"
import { SearchPath } from "../../domain/xdg/value-objects/search-path.vo"
import {
  type DirectoryKind,
  HOME_DEFAULTS,
  type HomeDirectoryKind,
  SEARCH_PATH_DEFAULTS,
  type SearchPathKind,
  VARIABLE_NAMES,
} from "../../domain/xdg/value-objects/xdg-variable.vo"
import {
  MissingHomeDirError,
  MissingRuntimeDirError,
} from "../../domain/xdg/errors/xdg.errors"

/**
 * Resolves XDG base directories and search paths from an environment.
 *
 * Every call reads the environment again; nothing is cached. Values that are
 * empty or not absolute are ignored in favour of the documented default.
 */
export class BaseDirectoryResolver {
  constructor(
    private readonly env: EnvironmentPort,
    private readonly platform: PlatformPort,
  ) {}

  /**
   * $XDG_DATA_HOME, or <home>/.local/share
   */
  getDataHome(): Result<BaseDirectory, MissingHomeDirError> {
    return this.resolveHome("data-home")
  }

  /**
   * $XDG_CONFIG_HOME, or <home>/.config
   */
  getConfigHome(): Result<BaseDirectory, MissingHomeDirError> {
    return this.resolveHome("config-home")
  }

  /**
   * $XDG_CACHE_HOME, or <home>/.cache
   */
  getCacheHome(): Result<BaseDirectory, MissingHomeDirError> {
    return this.resolveHome("cache-home")
  }

  /**
   * $XDG_RUNTIME_DIR. There is no default; an unusable value is an error.
   */
  getRuntimeDir(): Result<BaseDirectory, MissingRuntimeDirError> {
    const path = this.readAbsolute(VARIABLE_NAMES["runtime-dir"])
    if (path === undefined) {
      return Result.err(new MissingRuntimeDirError())
    }
    return Result.ok(BaseDirectory.fromEnvironment("runtime-dir", path))
  }

  /**
   * $XDG_DATA_DIRS, or [/usr/local/share, /usr/share]
   */
  getDataDirs(): SearchPath {
    return this.resolveSearchPath("data-dirs")
  }

  /**
   * $XDG_CONFIG_DIRS, or [/etc/xdg]
   */
  getConfigDirs(): SearchPath {
    return this.resolveSearchPath("config-dirs")
  }

  /**
   * Data home followed by the data directories, in lookup order
   */
  getDataSearchPath(): Result<readonly string[], MissingHomeDirError> {
    return Result.map(this.getDataHome(), (home) => [
      home.path,
      ...this.getDataDirs().paths,
    ])
  }

  /**
   * Config home followed by the config directories, in lookup order
   */
  getConfigSearchPath(): Result<readonly string[], MissingHomeDirError> {
    return Result.map(this.getConfigHome(), (home) => [
      home.path,
      ...this.getConfigDirs().paths,
    ])
  }

  /**
   * Resolve any kind by name
   */
  resolve(
    kind: DirectoryKind,
  ): Result<
    BaseDirectory | SearchPath,
    MissingHomeDirError | MissingRuntimeDirError
  > {
    switch (kind) {
      case "data-home":
      case "config-home":
      case "cache-home":
        return this.resolveHome(kind)
      case "runtime-dir":
        return this.getRuntimeDir()
      case "data-dirs":
      case "config-dirs":
        return Result.ok(this.resolveSearchPath(kind))
    }
  }

  private resolveHome(
    kind: HomeDirectoryKind,
  ): Result<BaseDirectory, MissingHomeDirError> {
    const variable = VARIABLE_NAMES[kind]
    const fromEnv = this.readAbsolute(variable)
    if (fromEnv !== undefined) {
      return Result.ok(BaseDirectory.fromEnvironment(kind, fromEnv))
    }

    const home = this.homeDir()
    if (home === undefined) {
      return Result.err(new MissingHomeDirError(variable))
    }

    const path = this.platform.join(home, ...HOME_DEFAULTS[kind])
    return Result.ok(BaseDirectory.fromDefault(kind, path))
  }

  private resolveSearchPath(kind: SearchPathKind): SearchPath {
    const raw = this.env.get(VARIABLE_NAMES[kind]) ?? ""

    // Empty and relative segments are dropped
    const paths = raw
      .split(this.platform.listSeparator)
      .filter((segment) => this.platform.isAbsolute(segment))

    if (paths.length === 0) {
      return SearchPath.fromDefault(kind, SEARCH_PATH_DEFAULTS[kind])
    }
    return SearchPath.fromEnvironment(kind, paths)
  }

  /**
   * $HOME when absolute, otherwise the platform lookup
   */
  private homeDir(): string | undefined {
    const fromEnv = this.readAbsolute("HOME")
    if (fromEnv !== undefined) {
      return fromEnv
    }

    const fromPlatform = this.platform.homeDir()
    if (fromPlatform && this.platform.isAbsolute(fromPlatform)) {
      return fromPlatform
    }
    return undefined
  }

  private readAbsolute(name: string): string | undefined {
    const value = this.env.get(name)
    if (value && this.platform.isAbsolute(value)) {
      return value
    }
    return undefined
  }
}
