/**
 * Outcome of validating a runtime directory candidate.
 * Only "valid" means the directory is safe to use.
 */
export type RuntimeDirStatus =
  | "valid"
  | "not-found"
  | "wrong-owner"
  | "insecure-permissions"

export const RuntimeDirStatuses = {
  VALID: "valid" as const,
  NOT_FOUND: "not-found" as const,
  WRONG_OWNER: "wrong-owner" as const,
  INSECURE_PERMISSIONS: "insecure-permissions" as const,
}

/**
 * Required access mode: owner read/write/execute, nothing for group or other
 */
export const RUNTIME_DIR_MODE = 0o700

export const PERMISSION_BITS = 0o777
