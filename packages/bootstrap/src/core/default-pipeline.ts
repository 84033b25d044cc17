import type { ConfigMapping, ConfigReader } from "@keel/config"
import {
  type LogLevelName,
  parseLogLevel,
  PrettyDestination,
  takenKeys,
  type WriteErrorHandler,
} from "@keel/logger"
import { LoggingPipeline } from "./logging-pipeline"
import { type StandardStreams, StreamSet } from "./pipeline-streams"
import { pick, readBoolean, readMapping, readNumber, readString } from "./section-values"

export const DEFAULT_MAX_BYTES = 10 * 1024 * 1024
export const DEFAULT_BACKUP_COUNT = 5

export type DefaultPipelineSettings = {
  level: LogLevelName
  /** Rotating log file; no file writer when absent. */
  file?: string
  maxBytes: number
  backupCount: number
  extraFields: Record<string, unknown>
  console: boolean
  prettify: boolean
}

/**
 * Reads the flat logging section. The file falls back to `paths.logs.file`
 * in `config`; unreadable values fall back to their defaults.
 */
export function readDefaultSettings(
  section: ConfigMapping,
  config: ConfigReader,
): DefaultPipelineSettings {
  const file = readString(section.file) ?? readString(config.get("paths.logs.file"))

  return {
    level: parseLogLevel(section.level, "info"),
    ...(file !== undefined && { file }),
    maxBytes: readNumber(pick(section, "max_bytes", "maxBytes"), DEFAULT_MAX_BYTES),
    backupCount: readNumber(pick(section, "backup_count", "backupCount"), DEFAULT_BACKUP_COUNT),
    extraFields: { ...readMapping(pick(section, "extra_fields", "extraFields")) },
    console: readBoolean(section.console, true),
    prettify: readPrettify(section),
  }
}

/** `json_format: false` asks for readable console lines unless `prettify` says otherwise. */
function readPrettify(section: ConfigMapping): boolean {
  const jsonFormat = readBoolean(pick(section, "json_format", "jsonFormat"), true)

  return readBoolean(section.prettify, !jsonFormat)
}

/**
 * One console writer (unless disabled) and, when a file is configured, one
 * size-rotated file writer. Both receive the structured record.
 */
export function buildDefaultPipeline(
  settings: DefaultPipelineSettings,
  serviceName: string,
  streams: StandardStreams,
  onWriteError?: WriteErrorHandler,
): LoggingPipeline {
  const set = new StreamSet(onWriteError)

  if (settings.console) {
    set.add(settings.prettify ? new PrettyDestination(streams.stdout) : streams.stdout)
  }

  if (settings.file !== undefined) {
    set.add(set.openFile(settings.file, settings.maxBytes, settings.backupCount))
  }

  const root = set.createRoot({
    level: settings.level,
    service: serviceName,
    staticFields: settings.extraFields,
  })

  return new LoggingPipeline(serviceName, root, set.opened, takenKeys(settings.extraFields), {
    root: settings.level,
  })
}
