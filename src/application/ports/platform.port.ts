/**
 * Port for the operating system's path rules.
 * The resolver is written once against this interface.
 */
export interface PlatformPort {
  /**
   * Delimiter between entries of a path-list variable
   */
  readonly listSeparator: string

  isAbsolute(path: string): boolean

  join(...segments: string[]): string

  /**
   * Home directory from the platform's account database, or undefined when
   * it cannot be determined
   */
  homeDir(): string | undefined
}
