import path from "node:path"
import type { PlatformPort } from "../../application/ports/platform.port"
import { accountHomeDir } from "./account-home"

/**
 * Path rules for Windows. Only list splitting and path joining are
 * meaningful there; runtime directory validation is not supported.
 */
export class Win32PlatformAdapter implements PlatformPort {
  readonly listSeparator = ";"

  constructor(
    private readonly lookupHome: () => string | undefined = accountHomeDir,
  ) {}

  isAbsolute(candidate: string): boolean {
    return path.win32.isAbsolute(candidate)
  }

  join(...segments: string[]): string {
    return path.win32.join(...segments)
  }

  homeDir(): string | undefined {
    return this.lookupHome()
  }
}
