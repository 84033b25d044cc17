import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for errors carrying a code and context, including ones built by
 * another copy of this package.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error)) return false

  const candidate: Record<string, unknown> = { ...e }

  return (
    typeof candidate.code === "string" &&
    isRecord(candidate.context) &&
    typeof candidate.isOperational === "boolean"
  )
}
