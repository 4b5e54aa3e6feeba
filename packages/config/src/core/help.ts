import chalk, { Chalk, type ChalkInstance } from "chalk"
import type { IDefaultRegistry } from "../ports/registry"
import type { Descriptor, SettingKind } from "../ports/setting"
import { formatDuration } from "./parse/duration"

export type HelpOptions = {
  /**
   * Receives one row at a time, without a trailing newline.
   *
   * @default writes the row and a newline to process.stdout
   */
  write?: (row: string) => void

  /**
   * Terminal width.
   *
   * @default process.stdout.columns, or 80 when stdout is not a terminal
   */
  columns?: number

  /**
   * `false` forces plain text, `true` forces basic colors. Left unset, chalk
   * decides from the terminal and FORCE_COLOR/NO_COLOR.
   */
  colors?: boolean
}

const DEFAULT_COLUMNS = 80
const TYPE_WIDTH = 12
const MAX_DESCRIPTION_WIDTH = 40
const MIN_VALUE_WIDTH = 8
const ELLIPSIS = "..."

const TYPE_LABELS: Record<SettingKind, string> = {
  string: "string",
  stringList: "list",
  int: "integer",
  int64: "integer",
  float: "float",
  bool: "boolean",
  duration: "duration",
}

/**
 * Prints every registered default as an aligned table, sorted by name:
 * name, type, description, default.
 *
 * Descriptions are cut at 40 characters and defaults at whatever width the
 * terminal leaves; cut cells end in "...".
 */
export function printHelp(
  registry: Pick<IDefaultRegistry, "list">,
  options: HelpOptions = {},
): void {
  const descriptors = registry.list()
  if (descriptors.length === 0) return

  const write = options.write ?? ((row: string) => process.stdout.write(`${row}\n`))
  const columns = options.columns ?? (process.stdout.columns || DEFAULT_COLUMNS)
  const paint = painter(options.colors)

  const nameWidth = Math.max(...descriptors.map((d) => d.name.length))
  const descWidth = Math.min(
    Math.max(...descriptors.map((d) => d.description.length)),
    MAX_DESCRIPTION_WIDTH,
  )
  const valueWidth = Math.max(
    columns - nameWidth - 2 - TYPE_WIDTH - 2 - descWidth - 4,
    MIN_VALUE_WIDTH,
  )

  for (const d of descriptors) {
    write(
      [
        paint.yellow(pad(d.name, nameWidth)),
        "  ",
        paint.cyan(pad(TYPE_LABELS[d.kind], TYPE_WIDTH)),
        "  ",
        paint.white(pad(d.description, descWidth)),
        "    ",
        paint.dim(truncate(formatValue(d), valueWidth)),
      ].join(""),
    )
  }
}

/** The default as it would be written in a `.env` file. */
export function formatValue(d: Descriptor): string {
  switch (d.kind) {
    case "stringList":
      return d.value.join(",")
    case "duration":
      return formatDuration(d.value)
    default:
      return String(d.value)
  }
}

function painter(colors: boolean | undefined): ChalkInstance {
  if (colors === undefined) return chalk

  return new Chalk({ level: colors ? chalk.level || 1 : 0 })
}

function truncate(value: string, width: number): string {
  if (value.length <= width) return value
  if (width <= ELLIPSIS.length) return value.slice(0, width)

  return value.slice(0, width - ELLIPSIS.length) + ELLIPSIS
}

function pad(value: string, width: number): string {
  return truncate(value, width).padEnd(width)
}
