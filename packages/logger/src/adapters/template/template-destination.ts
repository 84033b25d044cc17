import type { DestinationStream } from "pino"

const TOKEN = /\{([A-Za-z0-9_.-]+)\}/g

/**
 * Re-renders each structured JSON line through a `{field}` template before
 * handing it to `target`, e.g. `"{level}:{message}"` gives `INFO:hello`.
 */
export class TemplateDestination implements DestinationStream {
  constructor(
    private readonly template: string,
    private readonly target: DestinationStream,
  ) {}

  write(line: string): void {
    this.target.write(`${renderTemplate(this.template, parseRecord(line))}\n`)
  }
}

export function renderTemplate(template: string, record: Record<string, unknown>): string {
  return template.replace(TOKEN, (_match, key: string) => formatField(record[key]))
}

function formatField(value: unknown): string {
  if (value === undefined || value === null) return ""
  if (typeof value === "string") return value
  if (typeof value === "object") return JSON.stringify(value)

  return String(value)
}

function parseRecord(line: string): Record<string, unknown> {
  let parsed: unknown

  try {
    parsed = JSON.parse(line)
  } catch {
    return { message: line.trimEnd() }
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { message: line.trimEnd() }
  }

  return { ...parsed }
}
