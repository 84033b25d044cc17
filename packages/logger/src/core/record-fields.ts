import { RESERVED_FIELDS } from "../ports/structured-record"

const RESERVED: ReadonlySet<string> = new Set(RESERVED_FIELDS)

export function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }

  return out
}

/**
 * Keys a caller may not write: the reserved fields plus the service-wide
 * static fields, which were written first.
 */
export function takenKeys(staticFields: Record<string, unknown> = {}): ReadonlySet<string> {
  return new Set([...RESERVED, ...Object.keys(staticFields)])
}

/**
 * Drops undefined values and every key already taken by an earlier writer.
 */
export function guardFields(
  fields: Record<string, unknown>,
  taken: ReadonlySet<string> = RESERVED,
): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined || taken.has(k)) continue
    out[k] = v
  }

  return out
}
