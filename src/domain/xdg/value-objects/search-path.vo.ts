import type { PathSource } from "./base-directory.vo"
import type { SearchPathKind } from "./xdg-variable.vo"

/**
 * Value object for an ordered list of directories.
 * The first entry has the highest precedence.
 */
export class SearchPath {
  readonly paths: readonly string[]

  private constructor(
    readonly kind: SearchPathKind,
    paths: readonly string[],
    readonly source: PathSource,
  ) {
    this.paths = Object.freeze([...paths])
    Object.freeze(this)
  }

  static fromEnvironment(
    kind: SearchPathKind,
    paths: readonly string[],
  ): SearchPath {
    return new SearchPath(kind, paths, "environment")
  }

  static fromDefault(kind: SearchPathKind, paths: readonly string[]): SearchPath {
    return new SearchPath(kind, paths, "default")
  }

  /**
   * Join the entries back into a single variable value
   */
  join(separator: string): string {
    return this.paths.join(separator)
  }
}
