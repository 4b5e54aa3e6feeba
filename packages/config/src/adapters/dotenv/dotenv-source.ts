import fs from "node:fs/promises"
import path from "node:path"
import type { Assignment, ConfigSource, DotenvScope } from "../../ports/source"
import { parseDotenv } from "./parse-dotenv"

/**
 * Options for creating a dotenv configuration source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", "./config/.env.local"
   */
  file: string

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Reported in the load error if the file is malformed.
   *
   * @default "local"
   */
  scope?: DotenvScope
}

/**
 * A `.env` file on disk. A missing file, or a directory at the path, counts as
 * absent rather than an error.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string
  readonly scope: DotenvScope
  readonly path: string

  constructor(opts: DotenvSourceOptions) {
    this.path = path.resolve(opts.cwd ?? process.cwd(), opts.file)
    this.name = `dotenv:${this.path}`
    this.scope = opts.scope ?? "local"
  }

  async load(): Promise<Iterable<Assignment> | undefined> {
    if (!(await isReadableFile(this.path))) return undefined

    const content = await fs.readFile(this.path, "utf-8")

    return parseDotenv(content, this.path)
  }
}

async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath)

    return !stats.isDirectory()
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code
    if (code === "ENOENT" || code === "ENOTDIR") return false
    throw err
  }
}
