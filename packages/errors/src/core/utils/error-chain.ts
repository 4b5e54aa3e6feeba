/**
 * The thrown value followed by each `cause` beneath it, outermost first.
 * The walk ends at a value without a cause, at a value already visited, or
 * after `maxDepth` entries.
 *
 * @example
 * ```ts
 * errorChain(loadError) // [DotenvLoadError, DotenvParseError]
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const visited = new Set<unknown>()
  const chain: unknown[] = []

  for (let link = err; link != null && chain.length < maxDepth; link = causeOf(link)) {
    if (visited.has(link)) break

    visited.add(link)
    chain.push(link)
  }

  return chain
}

/** The innermost value of {@link errorChain}, or `err` itself when the chain is empty. */
export function rootCause(err: unknown): unknown {
  const chain = errorChain(err)

  return chain.length === 0 ? err : chain[chain.length - 1]
}

function causeOf(value: unknown): unknown {
  return typeof value === "object" && value !== null && "cause" in value ? value.cause : undefined
}
