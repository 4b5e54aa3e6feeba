const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i

export const INT64_MIN = -(2n ** 63n)
export const INT64_MAX = 2n ** 63n - 1n

/** Base-10 integer within the safe integer range, or `undefined`. */
export function parseInteger(raw: string): number | undefined {
  if (!INTEGER.test(raw)) return undefined

  const value = Number(raw)
  if (!Number.isSafeInteger(value)) return undefined

  // "-0" reads as zero
  return value === 0 ? 0 : value
}

/** Base-10 signed 64-bit integer, or `undefined`. */
export function parseInt64(raw: string): bigint | undefined {
  if (!INTEGER.test(raw)) return undefined

  const value = BigInt(raw)

  return value < INT64_MIN || value > INT64_MAX ? undefined : value
}

/**
 * Decimal or exponent notation, or `Inf`/`Infinity`/`NaN` with an optional sign.
 * A literal too large for a double (`1e400`) is rejected.
 */
export function parseFloat64(raw: string): number | undefined {
  const special = SPECIAL_FLOAT.exec(raw)

  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  if (!DECIMAL.test(raw)) return undefined

  const value = Number(raw)

  return Number.isFinite(value) ? value : undefined
}
