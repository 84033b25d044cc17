export type ConfigScalar = string | number | boolean | null

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMapping

export interface ConfigMapping {
  [key: string]: ConfigValue
}

/** Plain object check: not null, not a sequence. Does not inspect values. */
export function isConfigMapping(value: unknown): value is ConfigMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** Deep check that `value` is built only from mappings, sequences and scalars. */
export function isConfigValue(value: unknown): value is ConfigValue {
  if (value === null) return true

  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true
    case "object":
      if (Array.isArray(value)) return value.every(isConfigValue)
      return Object.values(value).every(isConfigValue)
    default:
      return false
  }
}
