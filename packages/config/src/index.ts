export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { type FileFormat, FileSource, type FileSourceOptions } from "./adapters/file/file-source"
export { FlagSource } from "./adapters/flags/flag-source"
export { ObjectSource } from "./adapters/object/object-source"
export { parseBool } from "./core/cast"
export {
  ConfigNotFoundError,
  ConfigParseError,
  InvalidFlagValueError,
  UnknownFlagError,
} from "./core/errors"
export { FlagSet } from "./core/flag-set"
export { type ConfigDocument, flattenDocument, normalizeKey } from "./core/keys"
export { LayeredConfig } from "./core/layered-config"
export type { ConfigView } from "./ports/config"
export type { FlagDefinition, FlagKind, FlagState, FlagValue } from "./ports/flags"
export type { ConfigSource } from "./ports/source"
export type { ConfigBindings, ConfigValue } from "./ports/value"
