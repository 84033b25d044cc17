import path from "node:path"
import type { ConfigFormat, FileSourceOptions, TextFileSource } from "../adapters/file/text-file-source"
import { IniSource } from "../adapters/ini/ini-source"
import { JsonSource } from "../adapters/json/json-source"
import { TomlSource } from "../adapters/toml/toml-source"
import { YamlSource } from "../adapters/yaml/yaml-source"
import type { ConfigMapping } from "../ports/config-tree"
import { ConfigError } from "./config-error"

/**
 * Recognised extensions in directory merge order.
 */
export const CONFIG_EXTENSIONS = [".json", ".yaml", ".yml", ".toml", ".ini", ".conf"] as const

export type ConfigExtension = (typeof CONFIG_EXTENSIONS)[number]

export const FORMAT_BY_EXTENSION: Readonly<Record<ConfigExtension, ConfigFormat>> = {
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
  ".ini": "ini",
  ".conf": "ini",
}

export function isConfigExtension(ext: string): ext is ConfigExtension {
  return (CONFIG_EXTENSIONS as readonly string[]).includes(ext)
}

export function formatForExtension(ext: string): ConfigFormat | undefined {
  return isConfigExtension(ext) ? FORMAT_BY_EXTENSION[ext] : undefined
}

export function createFileSource(format: ConfigFormat, opts: FileSourceOptions): TextFileSource {
  switch (format) {
    case "json":
      return new JsonSource(opts)
    case "yaml":
      return new YamlSource(opts)
    case "toml":
      return new TomlSource(opts)
    case "ini":
      return new IniSource(opts)
  }
}

/**
 * Loads one configuration file, picking the parser from its extension.
 */
export async function loadConfigFile(file: string): Promise<ConfigMapping> {
  const format = formatForExtension(path.extname(file))

  if (!format) {
    throw new ConfigError(`Unsupported configuration file extension: ${file}`, {
      code: "config_unsupported_format",
      context: { file },
    })
  }

  return createFileSource(format, { file, required: true }).load()
}
