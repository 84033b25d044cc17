import { DEFAULT_TEXT_FORMAT, parseLoggingSchema } from "../logging-schema"
import { LoggingSchemaError } from "../logging-schema-error"

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  throw new Error("expected a throw")
}

describe("parseLoggingSchema", () => {
  it("fills defaults", () => {
    expect(parseLoggingSchema({ version: 1 })).toEqual({
      version: 1,
      formatters: {},
      handlers: {},
      root: { level: "info", handlers: [] },
      loggers: {},
    })
  })

  it("normalises level names and aliases", () => {
    const schema = parseLoggingSchema({
      version: "1",
      handlers: { out: { type: "console", level: "WARNING" } },
      root: { level: "Critical", handlers: ["out"] },
      loggers: { "svc.db": { level: "DEBUG" } },
    })

    expect(schema.handlers.out).toEqual({ type: "console", stream: "stdout", level: "warn" })
    expect(schema.root.level).toBe("fatal")
    expect(schema.loggers["svc.db"]).toEqual({ level: "debug" })
  })

  it("coerces rotation counts and defaults text formats", () => {
    const schema = parseLoggingSchema({
      version: 1,
      formatters: { plain: { type: "text" } },
      handlers: {
        file: { type: "rotating_file", filename: "app.log", max_bytes: "1024", backup_count: 3 },
      },
    })

    expect(schema.formatters.plain).toEqual({ type: "text", format: DEFAULT_TEXT_FORMAT })
    expect(schema.handlers.file).toEqual({
      type: "rotating_file",
      filename: "app.log",
      max_bytes: 1024,
      backup_count: 3,
    })
  })

  it.each([
    ["a missing version", {}],
    ["an unsupported version", { version: 2 }],
    ["an unknown handler type", { version: 1, handlers: { x: { type: "syslog" } } }],
    ["an unknown level", { version: 1, root: { level: "loud" } }],
    ["a file handler without filename", { version: 1, handlers: { f: { type: "file" } } }],
  ])("rejects %s", (_label, section) => {
    const err = thrownBy(() => parseLoggingSchema(section))

    expect(err).toBeInstanceOf(LoggingSchemaError)
    expect(err).toMatchObject({ code: "logging_schema_invalid" })
  })

  it("rejects a handler naming a missing formatter", () => {
    const err = thrownBy(() =>
      parseLoggingSchema({
        version: 1,
        handlers: { out: { type: "console", formatter: "fancy" } },
      }),
    )

    expect(err).toBeInstanceOf(LoggingSchemaError)
    expect(err).toMatchObject({
      code: "logging_formatter_unknown",
      context: { handler: "out", formatter: "fancy" },
    })
  })

  it("rejects root naming a missing handler", () => {
    expect(thrownBy(() => parseLoggingSchema({ version: 1, root: { handlers: ["nowhere"] } }))).toMatchObject({
      code: "logging_handler_unknown",
      context: { handler: "nowhere" },
    })
  })
})
