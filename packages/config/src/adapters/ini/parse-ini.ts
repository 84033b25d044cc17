export type IniDocument = Record<string, string | Record<string, string>>

const SECTION = /^\[(.+)\]$/
const DEFAULT_SECTION = "DEFAULT"

type Option = { key: string; values: Map<string, string> }

/**
 * Parses INI text the way Python-style `configparser` files are written:
 *
 * - `[name]` opens a section; the name is taken literally, dots included
 * - `key = value` and `key: value` split on the first delimiter; keys are
 *   lower-cased, values stay strings
 * - indented lines continue the previous value on a new line
 * - `#` and `;` start whole-line comments
 * - `[DEFAULT]` values are inherited by every other section
 *
 * Keys before the first section stay at the top level.
 */
export function parseIni(content: string): IniDocument {
  const top = new Map<string, string>()
  const sections = new Map<string, Map<string, string>>()
  let values = top
  let last: Option | undefined

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim()

    if (line === "") {
      last = undefined
      return
    }
    if (line.startsWith("#") || line.startsWith(";")) return

    if (last !== undefined && /^\s/.test(raw)) {
      last.values.set(last.key, `${last.values.get(last.key) ?? ""}\n${line}`)
      return
    }

    const header = SECTION.exec(line)?.[1]
    if (header !== undefined) {
      if (sections.has(header)) throw new Error(`Line ${index + 1}: section [${header}] appears twice`)

      values = new Map()
      sections.set(header, values)
      last = undefined
      return
    }

    const at = line.search(/[=:]/)
    const key = at < 0 ? "" : line.slice(0, at).trim().toLowerCase()
    if (key === "") throw new Error(`Line ${index + 1}: expected "key = value", got "${line}"`)
    if (values.has(key)) throw new Error(`Line ${index + 1}: option "${key}" appears twice`)

    values.set(key, line.slice(at + 1).trim())
    last = { key, values }
  })

  const defaults = sections.get(DEFAULT_SECTION) ?? new Map<string, string>()
  sections.delete(DEFAULT_SECTION)

  return Object.fromEntries([
    ...top,
    ...[...sections].map(([name, own]) => [name, Object.fromEntries([...defaults, ...own])] as const),
  ])
}
