import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
  line: string
}

export const HARNESS_SERVICE = "contract-svc"
export const HARNESS_STATIC_FIELDS = { region: "test-region" }

/**
 * Builds a logger whose records are captured in memory. Implementations bind
 * `HARNESS_SERVICE` as both service and logger name and attach
 * `HARNESS_STATIC_FIELDS` to every record.
 */
export type LoggerHarness = {
  name: string
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}
