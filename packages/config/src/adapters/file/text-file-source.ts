import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../../core/config-error"
import { toConfigValue } from "../../core/tree"
import { type ConfigMapping, isConfigMapping } from "../../ports/config-tree"
import type { ConfigSource } from "../../ports/source"

export type ConfigFormat = "json" | "yaml" | "toml" | "ini"

/**
 * Options shared by every file-backed configuration source.
 */
export type FileSourceOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "settings.yaml", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Returns empty config if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
}

/**
 * Reads one text file and parses it into a config tree mapping.
 *
 * Parse failures and non-mapping documents surface as `ConfigError`.
 */
export abstract class TextFileSource implements ConfigSource {
  readonly name: string

  protected constructor(
    readonly format: ConfigFormat,
    private readonly opts: FileSourceOptions,
  ) {
    this.name = `${format}:${opts.file}`
  }

  protected abstract parse(content: string): unknown

  async load(): Promise<ConfigMapping> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFoundError(err)) {
        return {}
      }
      throw err
    }

    let parsed: unknown

    try {
      parsed = this.parse(content)
    } catch (err) {
      throw new ConfigError(`Failed to parse ${this.format} file ${filePath}`, {
        code: "config_parse_failed",
        context: { file: filePath, format: this.format },
        cause: err,
      })
    }

    const tree = toConfigValue(parsed)

    if (!isConfigMapping(tree)) {
      throw new ConfigError(`Top level of ${filePath} is not a mapping`, {
        code: "config_not_a_mapping",
        context: { file: filePath, format: this.format },
      })
    }

    return tree
  }
}
