/**
 * Lower-case, snake_case error code, e.g. `config_parse_failed`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (file names, keys, handler names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (a malformed file, an unwritable log
   * path), `false` for invariant violations.
   *
   * @default true
   */
  readonly isOperational: boolean

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for log records.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
