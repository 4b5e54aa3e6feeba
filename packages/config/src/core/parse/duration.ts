import type { Milliseconds } from "../../ports/setting"
import { INT64_MAX } from "./numbers"

const UNIT_NS: Record<string, bigint> = {
  ns: 1n,
  us: 1_000n,
  "µs": 1_000n,
  "μs": 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
}

// "ms" must be tried before "m"
const SEGMENT = /(\d+\.?\d*|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y

const NS_PER_MS = 1e6
const NS_PER_SECOND = 1e9
const NS_PER_MINUTE = 60 * NS_PER_SECOND
const NS_PER_HOUR = 60 * NS_PER_MINUTE

/**
 * Parses a duration such as `300ms`, `1.5h`, `2h45m` or `-1m30s` into milliseconds.
 *
 * A bare `0` (optionally signed) is accepted; any other number needs a unit.
 * Valid units are `ns`, `us` (or `µs`), `ms`, `s`, `m` and `h`. Segments are
 * summed in whole nanoseconds, dropping fractions of a nanosecond, and the sum
 * must fit a signed 64-bit nanosecond count.
 *
 * @returns The duration, or `undefined` if `text` is not a duration.
 */
export function parseDuration(text: string): Milliseconds | undefined {
  let rest = text
  let negative = false

  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest.startsWith("-")
    rest = rest.slice(1)
  }

  if (rest === "0") return 0
  if (rest === "") return undefined

  const limit = negative ? INT64_MAX + 1n : INT64_MAX
  let totalNs = 0n
  SEGMENT.lastIndex = 0

  while (SEGMENT.lastIndex < rest.length) {
    const match = SEGMENT.exec(rest)
    if (!match) return undefined

    const [, amount, unit] = match
    const unitNs = unit === undefined ? undefined : UNIT_NS[unit]

    if (amount === undefined || unitNs === undefined) return undefined

    totalNs += segmentNs(amount, unitNs)
    if (totalNs > limit) return undefined
  }

  if (totalNs === 0n) return 0

  const ms = Number(totalNs) / NS_PER_MS
  return negative ? -ms : ms
}

function segmentNs(amount: string, unitNs: bigint): bigint {
  const [whole = "", fraction = ""] = amount.split(".")
  const wholeNs = BigInt(whole || "0") * unitNs

  if (fraction === "") return wholeNs

  return wholeNs + (BigInt(fraction) * unitNs) / 10n ** BigInt(fraction.length)
}

/**
 * Formats milliseconds the way {@link parseDuration} reads them back:
 * `1h2m3s`, `1m30s`, `1.5s`, `300ms`, `500µs`, `0s`.
 */
export function formatDuration(ms: Milliseconds): string {
  if (!Number.isFinite(ms)) return String(ms)

  const ns = Math.round(Math.abs(ms) * NS_PER_MS)
  const sign = ms < 0 && ns > 0 ? "-" : ""

  if (ns === 0) return "0s"
  if (ns < 1e3) return `${sign}${ns}ns`
  if (ns < 1e6) return `${sign}${withFraction(ns, 1e3)}µs`
  if (ns < NS_PER_SECOND) return `${sign}${withFraction(ns, 1e6)}ms`

  const hours = Math.floor(ns / NS_PER_HOUR)
  const minutes = Math.floor((ns % NS_PER_HOUR) / NS_PER_MINUTE)
  const seconds = withFraction(ns % NS_PER_MINUTE, NS_PER_SECOND)

  if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}s`
  if (minutes > 0) return `${sign}${minutes}m${seconds}s`

  return `${sign}${seconds}s`
}

function withFraction(ns: number, unitNs: number): string {
  const whole = Math.floor(ns / unitNs)
  const fraction = ns % unitNs

  if (fraction === 0) return String(whole)

  const digits = String(unitNs).length - 1
  const decimals = String(fraction).padStart(digits, "0").replace(/0+$/, "")

  return `${whole}.${decimals}`
}
