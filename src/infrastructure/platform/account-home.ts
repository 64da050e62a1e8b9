import { userInfo } from "node:os"

/**
 * Home directory from the user account database (passwd on Unix).
 * Unlike os.homedir(), this ignores $HOME.
 */
export function accountHomeDir(): string | undefined {
  try {
    const { homedir } = userInfo()
    return homedir || undefined
  } catch {
    // userInfo() throws when the uid has no account entry
    return undefined
  }
}
