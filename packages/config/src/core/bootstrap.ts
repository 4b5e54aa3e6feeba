import { rootCause } from "@dotsettings/errors"
import { createNullLogger } from "@dotsettings/logger"
import type { ILoadResult } from "../ports/load-result"
import type { IDefaultRegistry } from "../ports/registry"
import { DotenvLoadError } from "./errors"
import { type HelpOptions, printHelp } from "./help"
import { type LoadDotenvOptions, loadDotenv } from "./load"

export type BootstrapOptions = LoadDotenvOptions & {
  registry: IDefaultRegistry

  /** Command-line arguments to scan for `--help` / `-h`. */
  argv?: readonly string[]

  help?: HelpOptions
}

export type BootstrapResult =
  | { status: "ready"; loaded: ILoadResult }
  | { status: "help" }
  | { status: "invalid"; error: DotenvLoadError }

const HELP_FLAGS = new Set(["--help", "-h"])

/**
 * Start-up sequence for programs configured through `.env` files: apply the
 * files, report a malformed one, and print the settings table when asked.
 *
 * The process is never exited; the caller acts on the returned status.
 */
export async function bootstrap(options: BootstrapOptions): Promise<BootstrapResult> {
  const { registry, argv = [], help, ...loadOptions } = options
  const logger = options.logger ?? createNullLogger()

  let outcome: BootstrapResult

  try {
    outcome = { status: "ready", loaded: await loadDotenv(loadOptions) }
  } catch (err) {
    if (!(err instanceof DotenvLoadError)) throw err

    const root = rootCause(err)

    logger.error(err.message, {
      module: "bootstrap",
      file: err.source,
      scope: err.scope,
      reason: root instanceof Error ? root.message : String(root),
      err,
    })

    outcome = { status: "invalid", error: err }
  }

  if (argv.some((arg) => HELP_FLAGS.has(arg))) {
    printHelp(registry, help)
    return { status: "help" }
  }

  return outcome
}
