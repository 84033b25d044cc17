import type { Logger, LogLevelName, LogMeta } from "@keel/logger"

export type CapturedEntry = {
  level: LogLevelName
  message: string
  meta: LogMeta | undefined
}

export class CaptureLogger implements Logger {
  readonly entries: CapturedEntry[] = []

  trace(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "trace", message, meta })
  }

  debug(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "debug", message, meta })
  }

  info(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "info", message, meta })
  }

  warn(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "warn", message, meta })
  }

  error(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "error", message, meta })
  }

  fatal(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "fatal", message, meta })
  }

  child(): Logger {
    return this
  }
}
