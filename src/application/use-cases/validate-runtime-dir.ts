import type { FileMetadataPort } from "../ports/file-metadata.port"
import {
  PERMISSION_BITS,
  RUNTIME_DIR_MODE,
  type RuntimeDirStatus,
  RuntimeDirStatuses,
} from "../../domain/runtime/value-objects/runtime-dir-status.vo"
import { Result } from "../../domain/shared/result"
import {
  RuntimeDirInspectionError,
  type RuntimeDirValidationError,
  UnsupportedPlatformError,
} from "../../domain/xdg/errors/xdg.errors"

/**
 * Checks a runtime directory candidate against the ownership and mode
 * requirements: an existing directory, owned by the effective user, with
 * access mode 0700.
 *
 * Read-only. Never creates the directory or repairs its permissions.
 */
export class RuntimeDirValidator {
  constructor(private readonly metadata: FileMetadataPort) {}

  validate(path: string): Result<RuntimeDirStatus, RuntimeDirValidationError> {
    const statResult = this.metadata.stat(path)
    if (!statResult.ok) {
      return Result.err(new RuntimeDirInspectionError(path, statResult.error))
    }

    const stats = statResult.value
    if (stats === null || !stats.isDirectory) {
      return Result.ok(RuntimeDirStatuses.NOT_FOUND)
    }

    const uid = this.metadata.effectiveUid()
    if (uid === undefined) {
      return Result.err(
        new UnsupportedPlatformError("effective user id is not available"),
      )
    }
    if (stats.uid !== uid) {
      return Result.ok(RuntimeDirStatuses.WRONG_OWNER)
    }

    if ((stats.mode & PERMISSION_BITS) !== RUNTIME_DIR_MODE) {
      return Result.ok(RuntimeDirStatuses.INSECURE_PERMISSIONS)
    }

    return Result.ok(RuntimeDirStatuses.VALID)
  }
}
