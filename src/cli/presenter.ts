import chalk from "chalk"
import type { RuntimeDirStatus } from "../domain/runtime/value-objects/runtime-dir-status.vo"

const STATUS_MESSAGES: Record<RuntimeDirStatus, string> = {
  valid: "is a directory owned by you with mode 0700",
  "not-found": "does not exist or is not a directory",
  "wrong-owner": "is not owned by the current user",
  "insecure-permissions": "is accessible to group or other users (mode must be 0700)",
}

/**
 * CLI presenter for formatted output using chalk.
 * Status goes to stderr, results to stdout.
 */
export class Presenter {
  /**
   * Write info message to stderr
   */
  info(message: string): void {
    console.error(chalk.blue("ℹ"), message)
  }

  /**
   * Write success message to stderr
   */
  success(message: string): void {
    console.error(chalk.green("✓"), message)
  }

  /**
   * Write warning message to stderr
   */
  warn(message: string): void {
    console.error(chalk.yellow("⚠"), message)
  }

  /**
   * Write error message to stderr
   */
  error(message: string): void {
    console.error(chalk.red("✗"), message)
  }

  /**
   * Write resolved values to stdout (for piping)
   */
  output(text: string): void {
    console.log(text)
  }

  describeRuntimeStatus(path: string, status: RuntimeDirStatus): string {
    return `Runtime directory ${chalk.bold(path)} ${STATUS_MESSAGES[status]}`
  }
}
