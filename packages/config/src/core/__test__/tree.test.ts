import { type ConfigMapping, type ConfigValue, isConfigMapping } from "../../ports/config-tree"
import { lookupKeyPath, lookupPath, setPath, toConfigValue } from "../tree"

const asMapping = (value: ConfigValue): ConfigMapping => {
  if (!isConfigMapping(value)) throw new Error("expected a mapping")
  return value
}

describe("lookupPath", () => {
  const tree: ConfigMapping = {
    database: { host: "db.local", port: 5432, password: null },
    servers: [{ name: "a" }, { name: "b" }],
    name: "svc",
  }

  it("walks mappings by key", () => {
    expect(lookupPath(tree, "database.host")).toEqual({ found: true, value: "db.local" })
  })

  it("indexes sequences with numeric segments", () => {
    expect(lookupPath(tree, "servers.1.name")).toEqual({ found: true, value: "b" })
  })

  it("reports a present null as found", () => {
    expect(lookupPath(tree, "database.password")).toEqual({ found: true, value: null })
  })

  it.each(["database.user", "servers.2", "servers.-1", "servers.x", "name.length", "database.host.x"])(
    "does not find %s",
    (path) => {
      expect(lookupPath(tree, path)).toEqual({ found: false })
    },
  )

  it("does not treat prototype members as keys", () => {
    expect(lookupPath(tree, "toString")).toEqual({ found: false })
  })

  it("addresses the root with the empty path", () => {
    expect(lookupPath(tree, "")).toEqual({ found: true, value: tree })
  })
})

describe("lookupKeyPath", () => {
  const tree: ConfigMapping = {
    database: { host: "db.local" },
    servers: [{ name: "a" }, { name: "b" }],
  }

  it("walks mappings by key", () => {
    expect(lookupKeyPath(tree, "database.host")).toEqual({ found: true, value: "db.local" })
  })

  it("returns a sequence but never indexes into one", () => {
    expect(lookupKeyPath(tree, "servers")).toEqual({ found: true, value: tree.servers })
    expect(lookupKeyPath(tree, "servers.0")).toEqual({ found: false })
    expect(lookupKeyPath(tree, "servers.1.name")).toEqual({ found: false })
  })
})

describe("setPath", () => {
  it("creates intermediate mappings", () => {
    const tree: ConfigMapping = {}

    setPath(tree, "a.b.c", 1)

    expect(tree).toEqual({ a: { b: { c: 1 } } })
  })

  it("replaces scalar intermediates with mappings", () => {
    const tree: ConfigMapping = { a: "scalar", keep: true }

    setPath(tree, "a.b", "x")

    expect(tree).toEqual({ a: { b: "x" }, keep: true })
  })

  it("keeps sibling keys of existing mappings", () => {
    const tree: ConfigMapping = { a: { x: 1 } }

    setPath(tree, "a.y", 2)

    expect(tree).toEqual({ a: { x: 1, y: 2 } })
  })
})

describe("toConfigValue", () => {
  it("turns dates into ISO strings and undefined into null", () => {
    expect(toConfigValue({ at: new Date("2024-01-02T03:04:05Z"), gone: undefined })).toEqual({
      at: "2024-01-02T03:04:05.000Z",
      gone: null,
    })
  })

  it("converts bigints by magnitude", () => {
    expect(toConfigValue([10n, 2n ** 60n])).toEqual([10, "1152921504606846976"])
  })

  it("rebuilds null-prototype objects as plain objects", () => {
    const raw = Object.assign(Object.create(null), { a: 1 })
    const value = toConfigValue(raw)

    expect(Object.getPrototypeOf(value)).toBe(Object.prototype)
    expect(value).toEqual({ a: 1 })
  })

  it("keeps a __proto__ key as an own data property", () => {
    const value = asMapping(toConfigValue(JSON.parse('{"__proto__": {"polluted": true}, "a": 1}')))

    expect(Object.getPrototypeOf(value)).toBe(Object.prototype)
    expect(Object.keys(value)).toEqual(["__proto__", "a"])
    expect(Object.getOwnPropertyDescriptor(value, "__proto__")?.value).toEqual({ polluted: true })
    expect(Object.prototype).not.toHaveProperty("polluted")
  })
})
