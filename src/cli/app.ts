import { checkRuntimeDir } from "../application/use-cases/check-runtime-dir"
import { BaseDirectoryResolver } from "../application/use-cases/resolve-base-directories"
import { RuntimeDirValidator } from "../application/use-cases/validate-runtime-dir"
import type { PlatformPort } from "../application/ports/platform.port"
import { RuntimeDirStatuses } from "../domain/runtime/value-objects/runtime-dir-status.vo"
import type { DirectoryKind } from "../domain/xdg/value-objects/xdg-variable.vo"
import { ProcessEnvironmentAdapter } from "../infrastructure/environment/process-environment.adapter"
import { NodeFileMetadataAdapter } from "../infrastructure/filesystem/node-file-metadata.adapter"
import { currentPlatform } from "../infrastructure/platform/current-platform"
import { formatEntries, type ResolvedEntry } from "./formatter"
import {
  type CliOptions,
  EXIT_CODES,
  getHelpText,
  parseCliArgs,
  VERSION,
} from "./parser"
import { Presenter } from "./presenter"

export interface AppDependencies {
  resolver: BaseDirectoryResolver
  validator: RuntimeDirValidator
  platform: PlatformPort
}

function defaultDependencies(): AppDependencies {
  const platform = currentPlatform()
  return {
    resolver: new BaseDirectoryResolver(new ProcessEnvironmentAdapter(), platform),
    validator: new RuntimeDirValidator(new NodeFileMetadataAdapter()),
    platform,
  }
}

/**
 * Main CLI application.
 * Wires dependencies and orchestrates the CLI flow.
 */
export class App {
  private readonly presenter = new Presenter()
  private readonly deps: AppDependencies

  constructor(deps: AppDependencies = defaultDependencies()) {
    this.deps = deps
  }

  /**
   * Run the CLI application and return the exit code
   */
  run(argv: string[]): number {
    const parseResult = parseCliArgs(argv)

    if (!parseResult.ok) {
      this.presenter.error(parseResult.error.message)
      this.presenter.info("Run 'xdg-basedir --help' for usage information.")
      return EXIT_CODES.USAGE_ERROR
    }

    const options = parseResult.value

    if (options.help) {
      this.presenter.output(getHelpText())
      return EXIT_CODES.SUCCESS
    }

    if (options.version) {
      this.presenter.output(`xdg-basedir v${VERSION}`)
      return EXIT_CODES.SUCCESS
    }

    const failed = this.printResolved(options)
    const checked = options.checkRuntime
      ? this.checkRuntime(failed.includes("runtime-dir"))
      : true

    return failed.length === 0 && checked
      ? EXIT_CODES.SUCCESS
      : EXIT_CODES.ERROR
  }

  /**
   * Print every requested value that resolves; report the rest.
   * Returns the kinds that failed.
   */
  private printResolved(options: CliOptions): DirectoryKind[] {
    const entries: ResolvedEntry[] = []
    const failed: DirectoryKind[] = []

    for (const kind of options.kinds) {
      const result = this.deps.resolver.resolve(kind)
      if (result.ok) {
        entries.push(result.value)
      } else {
        this.presenter.error(result.error.message)
        failed.push(kind)
      }
    }

    if (entries.length > 0) {
      this.presenter.output(
        formatEntries(entries, options.format, this.deps.platform.listSeparator),
      )
    }
    return failed
  }

  /**
   * @param runtimeDirReported whether a missing $XDG_RUNTIME_DIR was already
   * reported while printing
   */
  private checkRuntime(runtimeDirReported: boolean): boolean {
    const result = checkRuntimeDir(this.deps.resolver, this.deps.validator)
    if (!result.ok) {
      const duplicate =
        runtimeDirReported && result.error.code === "MISSING_RUNTIME_DIR"
      if (!duplicate) this.presenter.error(result.error.message)
      return false
    }

    const { directory, status } = result.value
    const message = this.presenter.describeRuntimeStatus(directory.path, status)
    if (status === RuntimeDirStatuses.VALID) {
      this.presenter.success(message)
      return true
    }

    this.presenter.warn(message)
    return false
  }
}
