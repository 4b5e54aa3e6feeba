import os from "node:os"
import { createNullLogger, type Logger } from "@dotsettings/logger"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import type { Environment } from "../ports/environment"
import type { ILoadResult } from "../ports/load-result"
import type { Assignment, ConfigSource } from "../ports/source"
import { DotenvLoadError, EnvAssignmentError } from "./errors"
import { LoadResult } from "./load-result"

export type LoadDotenvOptions = {
  /**
   * Where assignments are written.
   *
   * @default process.env
   */
  env?: Environment

  /**
   * Directory holding the user file. An empty string skips it.
   *
   * @default os.homedir()
   */
  homeDir?: string

  /**
   * Directory holding the local file.
   *
   * @default process.cwd()
   */
  cwd?: string

  /** Replaces the home and working-directory files. */
  sources?: readonly ConfigSource[]

  logger?: Logger
}

/**
 * Applies `<home>/.env` and then `<cwd>/.env` to the environment.
 *
 * Assignments overwrite existing variables, and the local file overwrites the
 * user file. Missing files are skipped.
 *
 * @throws DotenvLoadError (`bad_user_file` or `bad_local_file`) when a present
 * file is malformed or cannot be applied. Assignments made before the failing
 * line are kept, and later sources are not read.
 */
export async function loadDotenv(options: LoadDotenvOptions = {}): Promise<ILoadResult> {
  const env = options.env ?? process.env
  const logger = (options.logger ?? createNullLogger()).child({ module: "dotenv" })
  const sources = options.sources ?? defaultSources(options)

  const provenance = new Map<string, string>()
  const applied: string[] = []

  for (const source of sources) {
    const log = logger.child({ file: source.name, scope: source.scope })
    let count = 0

    try {
      const assignments = await source.load()

      if (assignments === undefined) {
        log.debug("skipping missing dotenv file")
        continue
      }

      for (const assignment of assignments) {
        assign(env, assignment, source)
        provenance.set(assignment.key, source.name)
        count++

        log.trace("assigned setting", { key: assignment.key, line: assignment.line })
      }
    } catch (err) {
      throw new DotenvLoadError(source.scope, source.name, err)
    }

    if (count > 0) applied.push(source.name)

    log.debug("applied dotenv file", { assignments: count })
  }

  return new LoadResult(provenance, applied)
}

function assign(env: Environment, { key, value, line }: Assignment, source: ConfigSource) {
  try {
    env[key] = value
  } catch (err) {
    throw new EnvAssignmentError(key, value, source.name, line, err)
  }
}

function defaultSources(options: LoadDotenvOptions): ConfigSource[] {
  const sources: ConfigSource[] = []
  const homeDir = options.homeDir ?? userHomeDir()

  if (homeDir) {
    sources.push(new DotenvSource({ file: ".env", cwd: homeDir, scope: "user" }))
  }

  sources.push(new DotenvSource({ file: ".env", cwd: options.cwd, scope: "local" }))

  return sources
}

// os.homedir() throws when the platform cannot report one; treat that as no user file.
function userHomeDir(): string {
  try {
    return os.homedir()
  } catch {
    return ""
  }
}
