import type { Descriptor, SettingDefault } from "./setting"

export interface IDefaultRegistry {
  /**
   * Stores the default for `name`, replacing any earlier registration.
   *
   * @throws InvalidDefaultError when the name is empty or the value does not
   * match its kind. The registry is left unchanged.
   */
  register(name: string, setting: SettingDefault, description?: string): Descriptor

  lookup(name: string): Descriptor | undefined

  has(name: string): boolean

  /** All descriptors, sorted by name. */
  list(): Descriptor[]

  readonly size: number
}
