import type { EnvironmentPort } from "../../application/ports/environment.port"

/**
 * Environment backed by a fixed set of variables.
 * The record is copied on construction, so later changes to it are not seen.
 */
export class RecordEnvironmentAdapter implements EnvironmentPort {
  private readonly variables: ReadonlyMap<string, string>

  constructor(variables: Readonly<Record<string, string | undefined>>) {
    const entries: [string, string][] = []
    for (const [name, value] of Object.entries(variables)) {
      if (value !== undefined) entries.push([name, value])
    }
    this.variables = new Map(entries)
  }

  get(name: string): string | undefined {
    return this.variables.get(name)
  }
}
