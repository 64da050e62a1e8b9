/**
 * XDG Base Directory resolution.
 *
 * The zero-argument functions read the live process environment and the
 * current platform's path rules. Use `createResolver` to resolve against a
 * synthetic environment instead.
 */

import type { EnvironmentPort } from "./application/ports/environment.port"
import type { FileMetadataPort } from "./application/ports/file-metadata.port"
import type { PlatformPort } from "./application/ports/platform.port"
import { BaseDirectoryResolver } from "./application/use-cases/resolve-base-directories"
import { RuntimeDirValidator } from "./application/use-cases/validate-runtime-dir"
import type { RuntimeDirStatus } from "./domain/runtime/value-objects/runtime-dir-status.vo"
import type { Result } from "./domain/shared/result"
import type { BaseDirectory } from "./domain/xdg/value-objects/base-directory.vo"
import type { SearchPath } from "./domain/xdg/value-objects/search-path.vo"
import type {
  MissingHomeDirError,
  MissingRuntimeDirError,
  RuntimeDirValidationError,
} from "./domain/xdg/errors/xdg.errors"
import { ProcessEnvironmentAdapter } from "./infrastructure/environment/process-environment.adapter"
import { RecordEnvironmentAdapter } from "./infrastructure/environment/record-environment.adapter"
import { NodeFileMetadataAdapter } from "./infrastructure/filesystem/node-file-metadata.adapter"
import { currentPlatform } from "./infrastructure/platform/current-platform"

export {
  type FileMetadata,
  FileMetadataError,
  type FileMetadataPort,
} from "./application/ports/file-metadata.port"
export type { EnvironmentPort } from "./application/ports/environment.port"
export type { PlatformPort } from "./application/ports/platform.port"
export {
  checkRuntimeDir,
  type RuntimeDirCheck,
} from "./application/use-cases/check-runtime-dir"
export { BaseDirectoryResolver } from "./application/use-cases/resolve-base-directories"
export { RuntimeDirValidator } from "./application/use-cases/validate-runtime-dir"
export {
  RUNTIME_DIR_MODE,
  type RuntimeDirStatus,
  RuntimeDirStatuses,
} from "./domain/runtime/value-objects/runtime-dir-status.vo"
export { DomainError, Result } from "./domain/shared/result"
export {
  MissingHomeDirError,
  MissingRuntimeDirError,
  RuntimeDirInspectionError,
  type RuntimeDirValidationError,
  UnsupportedPlatformError,
  type XdgError,
} from "./domain/xdg/errors/xdg.errors"
export {
  BaseDirectory,
  type PathSource,
} from "./domain/xdg/value-objects/base-directory.vo"
export { SearchPath } from "./domain/xdg/value-objects/search-path.vo"
export {
  ALL_DIRECTORY_KINDS,
  type BaseDirectoryKind,
  type DirectoryKind,
  type HomeDirectoryKind,
  type SearchPathKind,
  VARIABLE_NAMES,
} from "./domain/xdg/value-objects/xdg-variable.vo"
export { ProcessEnvironmentAdapter } from "./infrastructure/environment/process-environment.adapter"
export { RecordEnvironmentAdapter } from "./infrastructure/environment/record-environment.adapter"
export { NodeFileMetadataAdapter } from "./infrastructure/filesystem/node-file-metadata.adapter"
export { currentPlatform } from "./infrastructure/platform/current-platform"
export { PosixPlatformAdapter } from "./infrastructure/platform/posix-platform.adapter"
export { Win32PlatformAdapter } from "./infrastructure/platform/win32-platform.adapter"

export interface ResolverOptions {
  /**
   * Variables to resolve against, either as a plain record or a port.
   * Defaults to the live process environment.
   */
  env?: Readonly<Record<string, string | undefined>> | EnvironmentPort
  platform?: PlatformPort
}

function isEnvironmentPort(
  env: NonNullable<ResolverOptions["env"]>,
): env is EnvironmentPort {
  return typeof env.get === "function"
}

export function createResolver(
  options: ResolverOptions = {},
): BaseDirectoryResolver {
  const { env, platform = currentPlatform() } = options
  let environment: EnvironmentPort
  if (env === undefined) {
    environment = new ProcessEnvironmentAdapter()
  } else if (isEnvironmentPort(env)) {
    environment = env
  } else {
    environment = new RecordEnvironmentAdapter(env)
  }
  return new BaseDirectoryResolver(environment, platform)
}

export function createValidator(
  metadata: FileMetadataPort = new NodeFileMetadataAdapter(),
): RuntimeDirValidator {
  return new RuntimeDirValidator(metadata)
}

export function getDataHome(): Result<BaseDirectory, MissingHomeDirError> {
  return createResolver().getDataHome()
}

export function getConfigHome(): Result<BaseDirectory, MissingHomeDirError> {
  return createResolver().getConfigHome()
}

export function getCacheHome(): Result<BaseDirectory, MissingHomeDirError> {
  return createResolver().getCacheHome()
}

export function getRuntimeDir(): Result<BaseDirectory, MissingRuntimeDirError> {
  return createResolver().getRuntimeDir()
}

export function getDataDirs(): SearchPath {
  return createResolver().getDataDirs()
}

export function getConfigDirs(): SearchPath {
  return createResolver().getConfigDirs()
}

export function validateRuntimeDir(
  path: string,
): Result<RuntimeDirStatus, RuntimeDirValidationError> {
  return createValidator().validate(path)
}
