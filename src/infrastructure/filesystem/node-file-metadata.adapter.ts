import { statSync } from "node:fs"
import {
  type FileMetadata,
  FileMetadataError,
  type FileMetadataPort,
} from "../../application/ports/file-metadata.port"
import { Result } from "../../domain/shared/result"

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"])

/**
 * File metadata adapter using synchronous fs.stat.
 */
export class NodeFileMetadataAdapter implements FileMetadataPort {
  stat(path: string): Result<FileMetadata | null, FileMetadataError> {
    try {
      const stats = statSync(path)
      return Result.ok({
        isDirectory: stats.isDirectory(),
        uid: stats.uid,
        mode: stats.mode,
      })
    } catch (error) {
      const code = errorCode(error)
      if (code !== undefined && MISSING_CODES.has(code)) {
        return Result.ok(null)
      }

      const message =
        error instanceof Error ? error.message : "Unknown filesystem error"
      return Result.err(new FileMetadataError(message, code))
    }
  }

  effectiveUid(): number | undefined {
    return typeof process.geteuid === "function" ? process.geteuid() : undefined
  }
}

function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code
  }
  return undefined
}
