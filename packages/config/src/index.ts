export { DotenvSource } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export {
  type ConfigFormat,
  type FileSourceOptions,
  TextFileSource,
} from "./adapters/file/text-file-source"
export { IniSource } from "./adapters/ini/ini-source"
export { JsonSource } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { TomlSource } from "./adapters/toml/toml-source"
export { YamlSource } from "./adapters/yaml/yaml-source"
export { Config } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/config-error"
export { ConfigStore, type ConfigStoreOptions } from "./core/config-store"
export { type DiscoveredFile, discoverConfigFiles } from "./core/discover"
export { collectDirectories, ensureDirectories } from "./core/ensure-directories"
export {
  CONFIG_EXTENSIONS,
  type ConfigExtension,
  createFileSource,
  formatForExtension,
  loadConfigFile,
} from "./core/formats"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { type LoadConfigTreeOptions, type LoadedConfigTree, loadConfigTree } from "./core/load-config-tree"
export {
  type LoadSettingsOptions,
  loadSettings,
  loadSettingsFile,
  SETTINGS_EXTENSIONS,
  type SettingsFile,
} from "./core/load-settings"
export { mergeTrees } from "./core/merge"
export { type PlaceholderEnv, type ResolveOptions, resolvePlaceholders } from "./core/placeholders"
export { assignKey, lookupKeyPath, lookupPath, type PathLookup, setPath, toConfigValue } from "./core/tree"
export { type EnvRecord, withEnvFile } from "./core/with-env-file"
export type { IConfig } from "./ports/config"
export type { ConfigReader } from "./ports/config-reader"
export {
  type ConfigMapping,
  type ConfigScalar,
  type ConfigValue,
  isConfigMapping,
  isConfigValue,
} from "./ports/config-tree"
export type { ConfigSource } from "./ports/source"
