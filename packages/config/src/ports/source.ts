/**
 * Where an override file lives: `user` for the home directory, `local` for the
 * working directory.
 */
export type DotenvScope = "user" | "local"

/** One `KEY=VALUE` line. `line` is 1-based. */
export type Assignment = Readonly<{
  key: string
  value: string
  line: number
}>

/**
 * A source of environment overrides.
 *
 * A ConfigSource only *reads* assignments; the loader applies them to the
 * environment in order. Sources are evaluated in order; later sources
 * override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for logs and provenance.
   * Example: "dotenv:/home/dev/.env", "object:overrides"
   */
  readonly name: string

  /** Which failure code a malformed source maps to. */
  readonly scope: DotenvScope

  /**
   * Read the source.
   *
   * - Resolves to `undefined` when the source does not exist
   * - The iterable may be lazy and throw part-way through; assignments
   *   yielded before the failure are still applied
   */
  load(): Promise<Iterable<Assignment> | undefined>
}
