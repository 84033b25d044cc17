import {
  type LogLevelName,
  RotatingFileDestination,
  structuredPinoOptions,
  TemplateDestination,
  type WriteErrorHandler,
} from "@keel/logger"
import pino, { type DestinationStream, type Logger as PinoBase, type StreamEntry } from "pino"
import type { Closable } from "./logging-pipeline"

export type StandardStreams = {
  stdout: DestinationStream
  stderr: DestinationStream
}

export function standardStreams(stdout?: DestinationStream): StandardStreams {
  return {
    stdout: stdout ?? pino.destination({ dest: 1, sync: true }),
    stderr: pino.destination({ dest: 2, sync: true }),
  }
}

/**
 * Collects the streams of a pipeline under construction and remembers every
 * file writer it opened, so a failed build can release them.
 */
export class StreamSet {
  readonly entries: StreamEntry[] = []
  readonly opened: Closable[] = []

  constructor(private readonly onWriteError?: WriteErrorHandler) {}

  add(stream: DestinationStream, level: LogLevelName = "trace", template?: string): void {
    this.entries.push({
      stream: template === undefined ? stream : new TemplateDestination(template, stream),
      level,
    })
  }

  openFile(file: string, maxBytes = 0, backupCount = 0): RotatingFileDestination {
    const writer = new RotatingFileDestination({
      file,
      maxBytes,
      backupCount,
      ...(this.onWriteError && { onError: this.onWriteError }),
    })
    this.opened.push(writer)

    return writer
  }

  createRoot(opts: {
    level: LogLevelName
    service: string
    staticFields?: Record<string, unknown>
  }): PinoBase {
    return pino(structuredPinoOptions(opts), pino.multistream(this.entries))
  }
}
