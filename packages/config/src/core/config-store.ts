import path from "node:path"
import { ConsoleLogger, type Logger } from "@keel/logger"
import type { ConfigReader } from "../ports/config-reader"
import type { ConfigMapping, ConfigValue } from "../ports/config-tree"
import { ensureDirectories } from "./ensure-directories"
import { loadConfigTree } from "./load-config-tree"
import type { PlaceholderEnv } from "./placeholders"
import { cloneValue, lookupKeyPath, setPath } from "./tree"
import { withEnvFile } from "./with-env-file"

export type ConfigStoreOptions = {
  /**
   * Directory holding the configuration files.
   * @default "config"
   */
  dir?: string

  /**
   * Create the directories named under `paths` after every load.
   * @default true
   */
  autoCreateDirs?: boolean

  /**
   * Environment used for placeholder resolution.
   * @default process.env
   */
  env?: PlaceholderEnv

  /**
   * Optional `.env` file, relative to `process.cwd()`, consulted for
   * placeholders. Variables already present in `env` take precedence.
   */
  envFile?: string

  /** Receives load warnings. Defaults to a console logger at `warn`. */
  logger?: Logger
}

type Snapshot = {
  readonly tree: ConfigMapping
  readonly files: readonly string[]
}

/**
 * The merged configuration tree of one directory.
 *
 * Construct it once at startup and pass the instance to whatever needs
 * configuration. `load` and `reload` run one at a time; readers always see
 * either the previous tree or the new one.
 */
export class ConfigStore implements ConfigReader {
  private snapshot: Snapshot = { tree: {}, files: [] }
  private dir: string
  private readonly autoCreateDirs: boolean
  private readonly env: PlaceholderEnv
  private readonly envFile: string | undefined
  private readonly logger: Logger
  private queue: Promise<void> = Promise.resolve()

  constructor(options: ConfigStoreOptions = {}) {
    this.dir = options.dir ?? "config"
    this.autoCreateDirs = options.autoCreateDirs ?? true
    this.env = options.env ?? process.env
    this.envFile = options.envFile
    this.logger =
      options.logger ?? new ConsoleLogger({}, { level: "warn", name: "keel.config" })
  }

  get directory(): string {
    return this.dir
  }

  setDirectory(dir: string): void {
    this.dir = dir
  }

  /**
   * Loads the configured directory, or `dir` after making it the configured
   * one. Waits for any load already in progress.
   */
  load(dir?: string): Promise<void> {
    if (dir !== undefined) this.dir = dir

    const target = this.dir
    const run = this.queue.then(() => this.loadFrom(target))

    // keep the chain alive after a failed load; the caller sees the failure via `run`
    this.queue = run.then(
      () => undefined,
      () => undefined,
    )

    return run
  }

  reload(): Promise<void> {
    return this.load()
  }

  get(keyPath: string): ConfigValue | undefined
  get<D>(keyPath: string, defaultValue: D): ConfigValue | D
  get<D>(keyPath: string, defaultValue?: D): ConfigValue | D | undefined {
    const hit = lookupKeyPath(this.snapshot.tree, keyPath)

    return hit.found && hit.value !== null ? hit.value : defaultValue
  }

  has(keyPath: string): boolean {
    return lookupKeyPath(this.snapshot.tree, keyPath).found
  }

  /** In-memory only; the next load discards it. */
  set(keyPath: string, value: ConfigValue): void {
    setPath(this.snapshot.tree, keyPath, value)
  }

  getAll(): ConfigMapping {
    return cloneValue(this.snapshot.tree)
  }

  /**
   * Absolute filesystem path for the string at `keyPath`, resolved against the
   * working directory. Falls back to the working directory itself.
   */
  getPath(keyPath: string, defaultValue?: string): string {
    const value = this.get(keyPath, defaultValue)

    return path.resolve(typeof value === "string" ? value : "")
  }

  listLoadedFiles(): string[] {
    return [...this.snapshot.files]
  }

  private async loadFrom(dir: string): Promise<void> {
    const env = await withEnvFile(this.env, this.envFile)
    const { tree, files } = await loadConfigTree(dir, { env, logger: this.logger })

    this.snapshot = { tree, files }

    if (this.autoCreateDirs) {
      await ensureDirectories(tree.paths, this.logger)
    }
  }
}
