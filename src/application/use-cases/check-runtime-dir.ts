import type { RuntimeDirStatus } from "../../domain/runtime/value-objects/runtime-dir-status.vo"
import { Result } from "../../domain/shared/result"
import type { BaseDirectory } from "../../domain/xdg/value-objects/base-directory.vo"
import type {
  MissingRuntimeDirError,
  RuntimeDirValidationError,
} from "../../domain/xdg/errors/xdg.errors"
import type { BaseDirectoryResolver } from "./resolve-base-directories"
import type { RuntimeDirValidator } from "./validate-runtime-dir"

export interface RuntimeDirCheck {
  directory: BaseDirectory
  status: RuntimeDirStatus
}

/**
 * Resolve $XDG_RUNTIME_DIR and validate whatever it points at.
 */
export function checkRuntimeDir(
  resolver: BaseDirectoryResolver,
  validator: RuntimeDirValidator,
): Result<RuntimeDirCheck, MissingRuntimeDirError | RuntimeDirValidationError> {
  const runtimeDir = resolver.getRuntimeDir()
  if (!runtimeDir.ok) {
    return runtimeDir
  }

  const directory = runtimeDir.value
  return Result.map(validator.validate(directory.path), (status) => ({
    directory,
    status,
  }))
}
