import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted
 * - how records are rendered for humans vs machines
 * - which fields every record of the service carries
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Intended for local development. Structured JSON lines are emitted when
   * this is off.
   */
  prettify?: boolean

  /** Service name written to the `service` field of every record. */
  service?: string

  /** Logger name written to the `logger` field. */
  name?: string

  /**
   * Service-wide fields attached to every record. They never replace a
   * reserved field, and call-site fields never replace them.
   */
  staticFields?: Record<string, unknown>
}
