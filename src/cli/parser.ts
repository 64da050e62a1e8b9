import { parseArgs } from "node:util"
import { Result } from "../domain/shared/result"
import {
  ALL_DIRECTORY_KINDS,
  type DirectoryKind,
  XdgVariable,
} from "../domain/xdg/value-objects/xdg-variable.vo"

/**
 * POSIX exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE_ERROR: 2,
} as const

export type OutputFormat = "text" | "json" | "toml"

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json", "toml"]

/**
 * Parsed CLI options
 */
export interface CliOptions {
  kinds: DirectoryKind[]
  format: OutputFormat
  checkRuntime: boolean
  help: boolean
  version: boolean
}

/**
 * CLI parsing error
 */
export class CliParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "CliParseError"
  }
}

export const VERSION = "1.0.0"

export function getHelpText(): string {
  return `
xdg-basedir - show XDG base directories as resolved from the environment

USAGE:
    xdg-basedir [OPTIONS] [NAME...]

NAMES:
    ${ALL_DIRECTORY_KINDS.join(" ")}
    (default: all)

OPTIONS:
    -f, --format <FORMAT>    Output format: text, json, toml (default: text)
    --check-runtime          Validate ownership and mode of $XDG_RUNTIME_DIR
    -h, --help               Show this help message
    -v, --version            Show version

OUTPUT:
    Resolved values are written to stdout, one VARIABLE=value per line in
    text format. Search paths are joined with the platform list separator.
    Status messages are written to stderr.

EXIT STATUS:
    0  every requested value resolved (and the runtime directory is valid)
    1  a value could not be resolved, or the runtime check failed
    2  usage error
`.trim()
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(
  argv: string[],
): Result<CliOptions, CliParseError> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        format: { type: "string", short: "f", default: "text" },
        "check-runtime": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "v", default: false },
      },
      strict: true,
      allowPositionals: true,
    })

    const format = OUTPUT_FORMATS.find((candidate) => candidate === values.format)
    if (format === undefined) {
      return Result.err(
        new CliParseError(
          `Invalid format "${values.format}". Valid options: ${OUTPUT_FORMATS.join(", ")}`,
        ),
      )
    }

    const kinds: DirectoryKind[] = []
    for (const name of positionals) {
      if (!XdgVariable.isDirectoryKind(name)) {
        return Result.err(
          new CliParseError(
            `Unknown directory "${name}". Valid names: ${ALL_DIRECTORY_KINDS.join(", ")}`,
          ),
        )
      }
      if (!kinds.includes(name)) kinds.push(name)
    }

    return Result.ok({
      kinds: kinds.length > 0 ? kinds : [...ALL_DIRECTORY_KINDS],
      format,
      checkRuntime: values["check-runtime"] === true,
      help: values.help === true,
      version: values.version === true,
    })
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown argument parsing error"
    return Result.err(new CliParseError(message))
  }
}
