import {
  type ConfigMapping,
  type ConfigReader,
  type ConfigValue,
  isConfigMapping,
  type PlaceholderEnv,
} from "@keel/config"
import { isAppError } from "@keel/errors"
import { ConsoleLogger, type Logger } from "@keel/logger"
import type { DestinationStream } from "pino"
import { BridgeLogger, type PipelineSource } from "./bridge-logger"
import { buildDefaultPipeline, readDefaultSettings } from "./default-pipeline"
import type { LoggingPipeline } from "./logging-pipeline"
import { type StandardStreams, standardStreams } from "./pipeline-streams"
import { buildSchemaPipeline } from "./schema-pipeline"
import { pick, readString } from "./section-values"

export const DEFAULT_SERVICE_NAME = "app"

export type LoggingBridgeOptions = {
  /** Configuration the logging section and service name are read from. */
  config: ConfigReader

  /** Replaces stdout for console writers. */
  destination?: DestinationStream

  /**
   * Where schema failures are reported. Defaults to a console logger at
   * `warn`.
   */
  fallbackLogger?: Logger

  /**
   * Environment for logging schema placeholders.
   * @default process.env
   */
  env?: PlaceholderEnv
}

/**
 * Turns the `logging` configuration section into the process logging
 * pipeline and hands out loggers bound to it.
 */
export class LoggingBridge implements PipelineSource {
  private pipeline: LoggingPipeline | undefined
  private readonly config: ConfigReader
  private readonly streams: StandardStreams
  private readonly fallback: Logger
  private readonly env: PlaceholderEnv
  private readonly reportWriteError = (err: unknown, file: string): void => {
    this.fallback.warn("Log write failed", { file, err })
  }

  constructor(options: LoggingBridgeOptions) {
    this.config = options.config
    this.streams = standardStreams(options.destination)
    this.fallback =
      options.fallbackLogger ?? new ConsoleLogger({}, { level: "warn", name: "keel.logging" })
    this.env = options.env ?? process.env
  }

  get isActive(): boolean {
    return this.pipeline !== undefined
  }

  /** Service name of the active pipeline, `undefined` before `apply`. */
  get serviceName(): string | undefined {
    return this.pipeline?.serviceName
  }

  /**
   * Replaces the active pipeline. `section` defaults to the `logging`
   * configuration section; a section with `version` is a logging schema.
   * Never throws for bad configuration: the default pipeline is used instead.
   */
  apply(section?: ConfigValue, serviceNameOverride?: string): void {
    this.install(section, serviceNameOverride)
  }

  /** Closes every writer; the next log call applies the configuration again. */
  reset(): void {
    const previous = this.pipeline
    this.pipeline = undefined
    this.release(previous)
  }

  ensureActive(): LoggingPipeline {
    return this.pipeline ?? this.install()
  }

  /** Logger named `<service>.<name>`, or the service logger without a name. */
  getLogger(name?: string): Logger {
    this.ensureActive()

    return new BridgeLogger(this, name)
  }

  private install(section?: ConfigValue, serviceNameOverride?: string): LoggingPipeline {
    const raw = section ?? this.config.get("logging", {})
    const mapping = isConfigMapping(raw) ? raw : {}
    const serviceName = this.resolveServiceName(mapping, serviceNameOverride)

    const next = Object.hasOwn(mapping, "version")
      ? this.buildFromSchema(mapping, serviceName)
      : this.buildDefault(mapping, serviceName)

    const previous = this.pipeline
    this.pipeline = next
    this.release(previous)

    return next
  }

  private release(pipeline: LoggingPipeline | undefined): void {
    try {
      pipeline?.close()
    } catch (err) {
      this.fallback.warn("Could not close log writers", { err })
    }
  }

  private buildFromSchema(section: ConfigMapping, serviceName: string): LoggingPipeline {
    try {
      return buildSchemaPipeline(section, serviceName, {
        streams: this.streams,
        env: this.env,
        onWriteError: this.reportWriteError,
      })
    } catch (err) {
      this.fallback.warn("Logging schema could not be applied, using the default pipeline", {
        err,
        ...(isAppError(err) && { code: err.code }),
      })
      return this.buildDefault({}, serviceName)
    }
  }

  private buildDefault(section: ConfigMapping, serviceName: string): LoggingPipeline {
    const settings = readDefaultSettings(section, this.config)

    try {
      return buildDefaultPipeline(settings, serviceName, this.streams, this.reportWriteError)
    } catch (err) {
      this.fallback.warn("Log file could not be opened, logging to the console only", {
        file: settings.file,
        err,
      })
      return buildDefaultPipeline(
        { ...settings, file: undefined, console: true },
        serviceName,
        this.streams,
        this.reportWriteError,
      )
    }
  }

  private resolveServiceName(section: ConfigMapping, override: string | undefined): string {
    const candidates = [
      override,
      readString(pick(section, "service_name", "serviceName")),
      readString(this.config.get("application.name")),
      readString(this.config.get("service.name")),
    ]

    return candidates.find((name) => name !== undefined && name.trim() !== "") ?? DEFAULT_SERVICE_NAME
  }
}
