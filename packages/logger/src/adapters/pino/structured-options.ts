import type { LoggerOptions as PinoOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import { guardFields } from "../../core/record-fields"
import type { LoggerOptions } from "../../ports/logger-options"

/**
 * pino options producing one flat JSON record per line:
 * `timestamp` (ISO-8601, UTC), upper-case `level`, `service`, the static
 * fields, then bindings and call-site fields, then `message`.
 */
export function structuredPinoOptions(opts: Partial<LoggerOptions> = {}): PinoOptions {
  const base = {
    ...(opts.service !== undefined && { service: opts.service }),
    ...guardFields(opts.staticFields ?? {}),
  }

  return {
    ...(opts.level && { level: opts.level }),
    base,
    messageKey: "message",
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    serializers: { err: errWithCause },
  }
}
