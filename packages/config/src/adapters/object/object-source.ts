import type { Assignment, ConfigSource, DotenvScope } from "../../ports/source"

export type ObjectSourceOptions = {
  /** @default "object:overrides" */
  name?: string

  /** @default "local" */
  scope?: DotenvScope
}

/**
 * In-memory assignments, applied like a `.env` file with the same key order.
 * Line numbers count entries from 1.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string
  readonly scope: DotenvScope
  private readonly entries: ReadonlyArray<readonly [string, string]>

  constructor(values: Readonly<Record<string, string>>, opts: ObjectSourceOptions = {}) {
    this.name = opts.name ?? "object:overrides"
    this.scope = opts.scope ?? "local"
    this.entries = Object.entries(values)
  }

  async load(): Promise<Iterable<Assignment>> {
    return this.entries.map(([key, value], index) => ({ key, value, line: index + 1 }))
  }
}
