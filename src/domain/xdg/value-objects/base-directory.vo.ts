import type { BaseDirectoryKind } from "./xdg-variable.vo"

/**
 * Where a resolved value came from: the XDG variable itself, or the
 * documented default
 */
export type PathSource = "environment" | "default"

/**
 * Value object for a single resolved base directory.
 * Immutable. The path is absolute but not checked for existence.
 */
export class BaseDirectory {
  private constructor(
    readonly kind: BaseDirectoryKind,
    readonly path: string,
    readonly source: PathSource,
  ) {
    Object.freeze(this)
  }

  static fromEnvironment(kind: BaseDirectoryKind, path: string): BaseDirectory {
    return new BaseDirectory(kind, path, "environment")
  }

  static fromDefault(kind: BaseDirectoryKind, path: string): BaseDirectory {
    return new BaseDirectory(kind, path, "default")
  }

  toString(): string {
    return this.path
  }
}
