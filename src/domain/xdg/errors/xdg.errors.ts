import { DomainError } from "../../shared/result"

export class MissingHomeDirError extends DomainError {
  readonly code = "MISSING_HOME_DIR"

  constructor(readonly variable: string) {
    super(
      `Cannot determine the home directory and ${variable} is not set to an absolute path`,
    )
  }
}

export class MissingRuntimeDirError extends DomainError {
  readonly code = "MISSING_RUNTIME_DIR"

  constructor() {
    super("XDG_RUNTIME_DIR is not set to an absolute path")
  }
}

export class RuntimeDirInspectionError extends DomainError {
  readonly code = "RUNTIME_DIR_INSPECTION_ERROR"

  constructor(
    readonly path: string,
    cause: Error,
  ) {
    super(`Failed to inspect runtime directory ${path}: ${cause.message}`, {
      cause,
    })
  }
}

export class UnsupportedPlatformError extends DomainError {
  readonly code = "UNSUPPORTED_PLATFORM"

  constructor(detail: string) {
    super(`Unsupported platform: ${detail}`)
  }
}

export type RuntimeDirValidationError =
  | RuntimeDirInspectionError
  | UnsupportedPlatformError

export type XdgError =
  | MissingHomeDirError
  | MissingRuntimeDirError
  | RuntimeDirValidationError
