/** A duration expressed in milliseconds. May be fractional or negative. */
export type Milliseconds = number

/**
 * The value type carried by each setting kind.
 *
 * `int` holds a safe integer; `int64` holds a signed 64-bit integer as a bigint.
 */
export type SettingValues = {
  string: string
  stringList: readonly string[]
  int: number
  int64: bigint
  float: number
  bool: boolean
  duration: Milliseconds
}

export type SettingKind = keyof SettingValues

export const settingKinds = [
  "string",
  "stringList",
  "int",
  "int64",
  "float",
  "bool",
  "duration",
] as const satisfies readonly SettingKind[]

/**
 * A default value tagged with its kind.
 *
 * @example
 * ```ts
 * registry.register("DB_MAX", setting.int(6), "Maximum database connections")
 * ```
 */
export type SettingDefault<K extends SettingKind = SettingKind> = {
  [P in K]: Readonly<{ kind: P; value: SettingValues[P] }>
}[K]

/**
 * A registered setting: its name, its tagged default and a description for `--help`.
 * Descriptors are frozen once registered.
 */
export type Descriptor<K extends SettingKind = SettingKind> = {
  [P in K]: Readonly<{
    name: string
    kind: P
    value: SettingValues[P]
    description: string
  }>
}[K]
