/**
 * Fields every structured record carries. Extra fields never overwrite them.
 */
export const RESERVED_FIELDS = ["timestamp", "level", "logger", "service", "message"] as const

export type ReservedField = (typeof RESERVED_FIELDS)[number]

export type StructuredRecord = Record<ReservedField, string> & Record<string, unknown>
