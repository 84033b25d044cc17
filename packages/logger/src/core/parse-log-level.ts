import { type LogLevelName, logLevelNames } from "../ports/log-level"

const LEVEL_ALIASES: Readonly<Record<string, LogLevelName>> = {
  warning: "warn",
  critical: "fatal",
}

export function isLogLevelName(value: string): value is LogLevelName {
  return (logLevelNames as readonly string[]).includes(value)
}

/**
 * Reads a level name from configuration (`INFO`, `warning`, `Critical`...),
 * or `undefined` when it names no level.
 */
export function toLogLevelName(value: unknown): LogLevelName | undefined {
  if (typeof value !== "string") return undefined

  const name = value.trim().toLowerCase()

  if (isLogLevelName(name)) return name

  return Object.hasOwn(LEVEL_ALIASES, name) ? LEVEL_ALIASES[name] : undefined
}

/** Like `toLogLevelName`, with `fallback` for anything unrecognised. */
export function parseLogLevel(value: unknown, fallback: LogLevelName = "info"): LogLevelName {
  return toLogLevelName(value) ?? fallback
}
