import type { Environment } from "../ports/environment"
import type { IDefaultRegistry } from "../ports/registry"
import type { Milliseconds } from "../ports/setting"
import { parseDuration } from "./parse/duration"
import { parseFloat64, parseInt64, parseInteger } from "./parse/numbers"
import { DefaultRegistry } from "./registry"

export type SettingsOptions = {
  /**
   * Variables to read.
   *
   * @default process.env
   */
  env?: Environment

  /**
   * Defaults consulted when a variable is unset or cannot be parsed.
   *
   * @default a new, empty DefaultRegistry
   */
  registry?: IDefaultRegistry
}

/**
 * Typed access to settings.
 *
 * Each getter reads the variable from the environment and parses it. When the
 * variable is unset, or set but unparseable, the registered default of the same
 * kind is returned, and failing that the kind's zero value.
 *
 * `getBool` is the exception: a set variable is `true` only when it equals
 * "true" ignoring case, and any other value is `false` without consulting the
 * registry.
 */
export class Settings {
  private readonly env: Environment
  readonly registry: IDefaultRegistry

  constructor(options: SettingsOptions = {}) {
    this.env = options.env ?? process.env
    this.registry = options.registry ?? new DefaultRegistry()
  }

  getString(name: string): string {
    const raw = this.raw(name)
    if (raw !== undefined) return raw

    const d = this.registry.lookup(name)
    return d?.kind === "string" ? d.value : ""
  }

  /** Splits on commas. Elements are not trimmed. */
  getStringSlice(name: string): string[] {
    const raw = this.raw(name)
    if (raw !== undefined) return raw.split(",")

    const d = this.registry.lookup(name)
    return d?.kind === "stringList" ? [...d.value] : []
  }

  getInt(name: string): number {
    const raw = this.raw(name)
    const parsed = raw === undefined ? undefined : parseInteger(raw)
    if (parsed !== undefined) return parsed

    const d = this.registry.lookup(name)
    return d?.kind === "int" ? d.value : 0
  }

  /** Accepts an `int` default as well as an `int64` one. */
  getInt64(name: string): bigint {
    const raw = this.raw(name)
    const parsed = raw === undefined ? undefined : parseInt64(raw)
    if (parsed !== undefined) return parsed

    const d = this.registry.lookup(name)
    if (d?.kind === "int64") return d.value
    if (d?.kind === "int") return BigInt(d.value)

    return 0n
  }

  getFloat64(name: string): number {
    const raw = this.raw(name)
    const parsed = raw === undefined ? undefined : parseFloat64(raw)
    if (parsed !== undefined) return parsed

    const d = this.registry.lookup(name)
    return d?.kind === "float" ? d.value : 0
  }

  getBool(name: string): boolean {
    const raw = this.raw(name)
    if (raw !== undefined) return raw.toLowerCase() === "true"

    const d = this.registry.lookup(name)
    return d?.kind === "bool" ? d.value : false
  }

  getDuration(name: string): Milliseconds {
    const raw = this.raw(name)
    const parsed = raw === undefined ? undefined : parseDuration(raw)
    if (parsed !== undefined) return parsed

    const d = this.registry.lookup(name)
    return d?.kind === "duration" ? d.value : 0
  }

  private raw(name: string): string | undefined {
    return Object.hasOwn(this.env, name) ? this.env[name] : undefined
  }
}
