/**
 * Port for read-only environment variable lookup.
 * Lets callers resolve against a synthetic environment instead of the
 * process-wide one.
 */
export interface EnvironmentPort {
  /**
   * Get the value of a variable, or undefined when it is unset
   */
  get(name: string): string | undefined
}
