import fs from "node:fs/promises"
import path from "node:path"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import { isNotFoundError } from "../adapters/file/text-file-source"
import { ObjectSource } from "../adapters/object/object-source"
import type { IConfig } from "../ports/config"
import type { ConfigMapping } from "../ports/config-tree"
import type { ConfigSource } from "../ports/source"
import { createFileSource, FORMAT_BY_EXTENSION } from "./formats"
import { loadConfig } from "./load"
import { withEnvFile } from "./with-env-file"

/** Settings file candidates, in lookup order. */
export const SETTINGS_EXTENSIONS = [".yaml", ".yml", ".json", ".toml", ".ini", ".conf"] as const

export type LoadSettingsOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** @default "config" */
  dir?: string

  /** Base name of the settings file. @default "settings" */
  filename?: string

  /**
   * Prefix of the environment variables overriding file values: key `port`
   * is read from `${envPrefix}PORT`.
   * @default ""
   */
  envPrefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** `.env` file whose entries count as environment variables. */
  envFile?: string

  /** Applied last. */
  overrides?: ConfigMapping
}

export type SettingsFile = {
  file: string
  source: ConfigSource
  values: ConfigMapping
}

/**
 * Loads the first existing `<filename>.<ext>` in `dir`, following
 * `SETTINGS_EXTENSIONS`. Resolves to `undefined` when there is none.
 */
export async function loadSettingsFile(
  dir: string,
  filename = "settings",
): Promise<SettingsFile | undefined> {
  for (const ext of SETTINGS_EXTENSIONS) {
    const file = path.join(dir, `${filename}${ext}`)

    if (!(await isRegularFile(file))) continue

    const source = createFileSource(FORMAT_BY_EXTENSION[ext], { file, required: true })

    return { file, source, values: await source.load() }
  }

  return undefined
}

/**
 * Binds a settings file to a zod schema.
 *
 * Precedence, lowest first: the settings file, environment variables named
 * after the file's and the schema's top-level keys, then `overrides`.
 * Validation failures throw `ConfigError` with code `config_validation_failed`.
 */
export async function loadSettings<T extends Record<string, unknown>>(
  options: LoadSettingsOptions<T>,
): Promise<IConfig<T>> {
  const { schema, envPrefix = "" } = options
  const settings = await loadSettingsFile(options.dir ?? "config", options.filename)
  const fileValues = settings?.values ?? {}

  const env = await withEnvFile(options.env ?? process.env, options.envFile)
  const keys = [...new Set([...Object.keys(fileValues), ...schemaKeys(schema)])]

  const sources: ConfigSource[] = [
    new ObjectSource(fileValues, settings?.source.name ?? "file"),
    new EnvSource({ env, prefix: envPrefix, keys }),
    new ObjectSource(options.overrides ?? {}),
  ]

  return loadConfig({ schema, sources })
}

function schemaKeys(schema: ZodType): string[] {
  return schema instanceof z.ZodObject ? Object.keys(schema.shape) : []
}

async function isRegularFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile()
  } catch (err) {
    if (isNotFoundError(err)) return false
    throw err
  }
}
