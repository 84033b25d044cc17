import type { Logger, LogLevelName, LogMeta } from "@keel/logger"
import type { DestinationStream } from "pino"

/** Collects everything a pipeline writes to it. */
export class MemoryDestination implements DestinationStream {
  readonly chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  lines(): string[] {
    return this.chunks
      .join("")
      .split("\n")
      .filter((line) => line !== "")
  }

  records(): Record<string, unknown>[] {
    return this.lines().map((line) => JSON.parse(line))
  }
}

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
