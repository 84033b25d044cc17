import { type ConfigMapping, type ConfigValue, isConfigMapping } from "@keel/config"

/** First key of `keys` present in `section`, so snake_case and camelCase spellings both work. */
export function pick(section: ConfigMapping, ...keys: string[]): ConfigValue | undefined {
  for (const key of keys) {
    if (Object.hasOwn(section, key)) return section[key]
  }

  return undefined
}

export function readString(value: ConfigValue | undefined): string | undefined {
  if (typeof value === "string") return value.trim() === "" ? undefined : value
  if (typeof value === "number") return String(value)

  return undefined
}

/** Numbers, or numeric strings as INI files and placeholders produce them. */
export function readNumber(value: ConfigValue | undefined, fallback: number): number {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value

  return typeof n === "number" && Number.isFinite(n) ? n : fallback
}

export function readBoolean(value: ConfigValue | undefined, fallback: boolean): boolean {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return fallback

  switch (value.trim().toLowerCase()) {
    case "true":
    case "yes":
    case "on":
    case "1":
      return true
    case "false":
    case "no":
    case "off":
    case "0":
      return false
    default:
      return fallback
  }
}

export function readMapping(value: ConfigValue | undefined): ConfigMapping {
  return isConfigMapping(value) ? value : {}
}
