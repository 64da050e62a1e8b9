import path from "node:path"
import type { PlatformPort } from "../../application/ports/platform.port"
import { accountHomeDir } from "./account-home"

/**
 * Path rules for Linux, macOS and the BSDs.
 */
export class PosixPlatformAdapter implements PlatformPort {
  readonly listSeparator = ":"

  constructor(
    private readonly lookupHome: () => string | undefined = accountHomeDir,
  ) {}

  isAbsolute(candidate: string): boolean {
    return path.posix.isAbsolute(candidate)
  }

  join(...segments: string[]): string {
    return path.posix.join(...segments)
  }

  homeDir(): string | undefined {
    return this.lookupHome()
  }
}
