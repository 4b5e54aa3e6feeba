import type { ILoadResult } from "../ports/load-result"
import type { Descriptor, Milliseconds, SettingDefault } from "../ports/setting"
import { type HelpOptions, printHelp } from "./help"
import { type LoadDotenvOptions, loadDotenv } from "./load"
import { DefaultRegistry } from "./registry"
import { Settings } from "./settings"

/**
 * Process-wide registry behind the module-level functions below. Programs
 * that prefer explicit wiring can construct their own DefaultRegistry and
 * Settings instead.
 */
export const defaultRegistry = new DefaultRegistry()

const settings = new Settings({ registry: defaultRegistry })

export function register(name: string, setting: SettingDefault, description?: string): Descriptor {
  return defaultRegistry.register(name, setting, description)
}

export function lookupDefault(name: string): Descriptor | undefined {
  return defaultRegistry.lookup(name)
}

export function getString(name: string): string {
  return settings.getString(name)
}

export function getStringSlice(name: string): string[] {
  return settings.getStringSlice(name)
}

export function getInt(name: string): number {
  return settings.getInt(name)
}

export function getInt64(name: string): bigint {
  return settings.getInt64(name)
}

export function getFloat64(name: string): number {
  return settings.getFloat64(name)
}

export function getBool(name: string): boolean {
  return settings.getBool(name)
}

export function getDuration(name: string): Milliseconds {
  return settings.getDuration(name)
}

/** Applies `<home>/.env` and `<cwd>/.env` to process.env. */
export function load(options: Omit<LoadDotenvOptions, "env"> = {}): Promise<ILoadResult> {
  return loadDotenv(options)
}

export function help(options?: HelpOptions): void {
  printHelp(defaultRegistry, options)
}
