import type { DestinationStream } from "pino"
import { type PrettyOptions, prettyFactory } from "pino-pretty"

const PRETTY_OPTIONS: PrettyOptions = {
  colorize: false,
  messageKey: "message",
  timestampKey: "timestamp",
  translateTime: "SYS:HH:MM:ss.l",
  messageFormat: "[{logger}] {message}",
  ignore: "logger,service",
}

/**
 * Renders each structured line with pino-pretty before handing it to
 * `target`, e.g. `[12:00:00.000] WARN: [svc.api] careful`.
 */
export class PrettyDestination implements DestinationStream {
  private readonly render: (line: string) => string

  constructor(
    private readonly target: DestinationStream,
    options: PrettyOptions = {},
  ) {
    this.render = prettyFactory({ ...PRETTY_OPTIONS, ...options })
  }

  write(line: string): void {
    this.target.write(this.render(line))
  }
}
