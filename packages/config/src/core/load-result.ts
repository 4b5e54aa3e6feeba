import type { ILoadResult } from "../ports/load-result"

export class LoadResult implements ILoadResult {
  private readonly provenance: ReadonlyMap<string, string>
  private readonly applied: readonly string[]

  constructor(provenance: ReadonlyMap<string, string>, applied: readonly string[]) {
    this.provenance = new Map(provenance)
    this.applied = Object.freeze([...applied])
  }

  keys(): string[] {
    return [...this.provenance.keys()]
  }

  explain(key: string): string | undefined {
    return this.provenance.get(key)
  }

  sourcesUsed(): string[] {
    return [...this.applied]
  }
}
