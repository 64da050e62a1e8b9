import { stringify } from "@iarna/toml"
import { BaseDirectory } from "../domain/xdg/value-objects/base-directory.vo"
import type { SearchPath } from "../domain/xdg/value-objects/search-path.vo"
import { VARIABLE_NAMES } from "../domain/xdg/value-objects/xdg-variable.vo"
import type { OutputFormat } from "./parser"

export type ResolvedEntry = BaseDirectory | SearchPath

/**
 * Render resolved entries, keyed by variable name, in the requested format.
 * Search paths are joined with `listSeparator` in text format and emitted
 * as arrays otherwise.
 */
export function formatEntries(
  entries: readonly ResolvedEntry[],
  format: OutputFormat,
  listSeparator: string,
): string {
  switch (format) {
    case "text":
      return entries
        .map(
          (entry) =>
            `${VARIABLE_NAMES[entry.kind]}=${textValue(entry, listSeparator)}`,
        )
        .join("\n")
    case "json":
      return JSON.stringify(toRecord(entries), null, 2)
    case "toml":
      return stringify(toRecord(entries)).trimEnd()
  }
}

function textValue(entry: ResolvedEntry, listSeparator: string): string {
  return entry instanceof BaseDirectory
    ? entry.path
    : entry.join(listSeparator)
}

function toRecord(
  entries: readonly ResolvedEntry[],
): Record<string, string | string[]> {
  const record: Record<string, string | string[]> = {}
  for (const entry of entries) {
    record[VARIABLE_NAMES[entry.kind]] =
      entry instanceof BaseDirectory ? entry.path : [...entry.paths]
  }
  return record
}
