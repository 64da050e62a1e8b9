import type { EnvironmentPort } from "../../application/ports/environment.port"

/**
 * Reads the live process environment on every lookup.
 */
export class ProcessEnvironmentAdapter implements EnvironmentPort {
  get(name: string): string | undefined {
    return process.env[name]
  }
}
