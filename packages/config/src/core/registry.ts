import { z } from "zod"
import type { IDefaultRegistry } from "../ports/registry"
import type { Descriptor, SettingDefault } from "../ports/setting"
import { InvalidDefaultError } from "./errors"
import { INT64_MAX, INT64_MIN } from "./parse/numbers"

const settingDefaultSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("string"), value: z.string() }),
  z.object({ kind: z.literal("stringList"), value: z.array(z.string()).readonly() }),
  z.object({ kind: z.literal("int"), value: z.int() }),
  z.object({ kind: z.literal("int64"), value: z.bigint().gte(INT64_MIN).lte(INT64_MAX) }),
  z.object({ kind: z.literal("float"), value: z.number() }),
  z.object({ kind: z.literal("bool"), value: z.boolean() }),
  z.object({ kind: z.literal("duration"), value: z.number() }),
])

const registrationSchema = z.object({
  name: z.string().min(1, "name must not be empty"),
  description: z.string(),
  default: settingDefaultSchema,
})

/**
 * The table of setting defaults consulted when a variable is unset or unparseable.
 *
 * Registration normally happens once at start-up. Each entry is a frozen
 * descriptor replaced as a whole, so a lookup sees either the old or the new
 * registration, never a mix.
 */
export class DefaultRegistry implements IDefaultRegistry {
  private readonly entries = new Map<string, Descriptor>()

  register(name: string, setting: SettingDefault, description: string = ""): Descriptor {
    const result = registrationSchema.safeParse({ name, description, default: setting })

    if (!result.success) {
      throw new InvalidDefaultError(name, z.prettifyError(result.error))
    }

    const descriptor: Descriptor = Object.freeze({
      ...result.data.default,
      name: result.data.name,
      description: result.data.description,
    })

    this.entries.set(descriptor.name, descriptor)

    return descriptor
  }

  lookup(name: string): Descriptor | undefined {
    return this.entries.get(name)
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  list(): Descriptor[] {
    return [...this.entries.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    )
  }

  get size(): number {
    return this.entries.size
  }
}

/**
 * Builders for {@link SettingDefault} values.
 *
 * @example
 * ```ts
 * registry.register("HTTP_TIMEOUT", setting.duration(30_000), "Outbound request timeout")
 * ```
 */
export const setting = {
  string: (value: string): SettingDefault<"string"> => ({ kind: "string", value }),
  stringList: (value: readonly string[]): SettingDefault<"stringList"> => ({
    kind: "stringList",
    value,
  }),
  int: (value: number): SettingDefault<"int"> => ({ kind: "int", value }),
  int64: (value: bigint): SettingDefault<"int64"> => ({ kind: "int64", value }),
  /**
   * The value must be finite: `Infinity` and `NaN` are rejected here, although
   * `getFloat64` reads `Inf` and `NaN` from the environment.
   */
  float: (value: number): SettingDefault<"float"> => ({ kind: "float", value }),
  bool: (value: boolean): SettingDefault<"bool"> => ({ kind: "bool", value }),
  duration: (value: number): SettingDefault<"duration"> => ({ kind: "duration", value }),
}
