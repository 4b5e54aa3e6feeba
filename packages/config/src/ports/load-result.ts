/**
 * What a call to `loadDotenv` applied, and from where.
 *
 * @example
 * ```typescript
 * const result = await loadDotenv()
 *
 * result.explain("DB_MAX") // "dotenv:/srv/app/.env"
 * result.sourcesUsed()     // ["dotenv:/home/dev/.env", "dotenv:/srv/app/.env"]
 * ```
 */
export interface ILoadResult {
  /**
   * Names the source that last assigned `key`.
   *
   * @returns The source name, or `undefined` if no loaded source set the key.
   */
  explain(key: string): string | undefined

  /**
   * Returns the names of all sources that contributed at least one value.
   *
   * @returns Array of source names in the order they were applied.
   */
  sourcesUsed(): string[]

  /** Every key assigned during the load, in first-assignment order. */
  keys(): string[]
}
