import type { PlatformPort } from "../../application/ports/platform.port"
import { PosixPlatformAdapter } from "./posix-platform.adapter"
import { Win32PlatformAdapter } from "./win32-platform.adapter"

export function currentPlatform(
  platform: NodeJS.Platform = process.platform,
): PlatformPort {
  return platform === "win32"
    ? new Win32PlatformAdapter()
    : new PosixPlatformAdapter()
}
