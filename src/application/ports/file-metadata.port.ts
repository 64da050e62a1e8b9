import type { Result } from "../../domain/shared/result"

/**
 * Error that occurs when a path's metadata cannot be read
 */
export class FileMetadataError extends Error {
  readonly code = "FILE_METADATA_ERROR"

  constructor(
    message: string,
    readonly errno?: string,
  ) {
    super(message)
    this.name = "FileMetadataError"
  }
}

/**
 * Subset of stat information the runtime directory checks need
 */
export interface FileMetadata {
  readonly isDirectory: boolean
  readonly uid: number
  readonly mode: number
}

/**
 * Port interface for filesystem metadata.
 * Infrastructure layer implements this interface.
 */
export interface FileMetadataPort {
  /**
   * Stat a path, following symlinks
   * @returns The metadata, null when nothing exists at the path, or an error
   */
  stat(path: string): Result<FileMetadata | null, FileMetadataError>

  /**
   * Effective user id of the current process, or undefined on platforms
   * without one
   */
  effectiveUid(): number | undefined
}
