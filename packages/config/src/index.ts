export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { parseDotenv } from "./adapters/dotenv/parse-dotenv"
export { ObjectSource, type ObjectSourceOptions } from "./adapters/object/object-source"
export {
  type BootstrapOptions,
  type BootstrapResult,
  bootstrap,
} from "./core/bootstrap"
export {
  type DotenvLoadCode,
  DotenvLoadError,
  type DotenvParseFailure,
  DotenvParseError,
  EnvAssignmentError,
  InvalidDefaultError,
} from "./core/errors"
export {
  defaultRegistry,
  getBool,
  getDuration,
  getFloat64,
  getInt,
  getInt64,
  getString,
  getStringSlice,
  help,
  load,
  lookupDefault,
  register,
} from "./core/global"
export { formatValue, type HelpOptions, printHelp } from "./core/help"
export { type LoadDotenvOptions, loadDotenv } from "./core/load"
export { LoadResult } from "./core/load-result"
export { formatDuration, parseDuration } from "./core/parse/duration"
export { parseFloat64, parseInt64, parseInteger } from "./core/parse/numbers"
export { DefaultRegistry, setting } from "./core/registry"
export { Settings, type SettingsOptions } from "./core/settings"
export type { Environment } from "./ports/environment"
export type { ILoadResult } from "./ports/load-result"
export type { IDefaultRegistry } from "./ports/registry"
export {
  type Descriptor,
  type Milliseconds,
  type SettingDefault,
  type SettingKind,
  type SettingValues,
  settingKinds,
} from "./ports/setting"
export type { Assignment, ConfigSource, DotenvScope } from "./ports/source"
