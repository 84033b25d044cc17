import type { ConfigMapping } from "../../ports/config-tree"
import { resolvePlaceholders } from "../placeholders"

describe("resolvePlaceholders", () => {
  it("prefers the environment over the tree", () => {
    const tree: ConfigMapping = { FOO: "tree_val", value: "${FOO}" }

    expect(resolvePlaceholders(tree, { env: { FOO: "env_val" } }).value).toBe("env_val")
  })

  it("falls back to tree, then default, then empty string", () => {
    const tree: ConfigMapping = {
      FOO: "tree_val",
      fromTree: "${FOO}",
      fromDefault: "${MISSING:fallback}",
      empty: "${MISSING}",
      emptyDefault: "${MISSING:}",
    }

    const resolved = resolvePlaceholders(tree, { env: {} })

    expect(resolved).toMatchObject({
      fromTree: "tree_val",
      fromDefault: "fallback",
      empty: "",
      emptyDefault: "",
    })
  })

  it("lets an environment key with an empty value win", () => {
    const tree: ConfigMapping = { FOO: "tree_val", value: "${FOO:d}" }

    expect(resolvePlaceholders(tree, { env: { FOO: "" } }).value).toBe("")
  })

  it("resolves dot paths inside longer strings", () => {
    const tree: ConfigMapping = {
      paths: { logs: { dir: "/var/tmp" } },
      file: "${paths.logs.dir}/app.log",
    }

    expect(resolvePlaceholders(tree, { env: {} }).file).toBe("/var/tmp/app.log")
  })

  it("indexes sequences, including a sequence root", () => {
    expect(resolvePlaceholders(["first", "${0}-copy"], { env: {} })).toEqual(["first", "first-copy"])

    const tree: ConfigMapping = { hosts: ["a", "b"], second: "${hosts.1}" }
    expect(resolvePlaceholders(tree, { env: {} }).second).toBe("b")
  })

  it("stringifies numbers, booleans and structures", () => {
    const tree: ConfigMapping = {
      port: 8080,
      on: true,
      db: { host: "h" },
      text: "${port}|${on}|${db}",
    }

    expect(resolvePlaceholders(tree, { env: {} }).text).toBe('8080|true|{"host":"h"}')
  })

  it("treats a null in the tree as not found", () => {
    const tree: ConfigMapping = { nothing: null, value: "${nothing:dflt}" }

    expect(resolvePlaceholders(tree, { env: {} }).value).toBe("dflt")
  })

  it("does not rescan substituted text", () => {
    const tree: ConfigMapping = { value: "${A}" }

    expect(resolvePlaceholders(tree, { env: { A: "${B}", B: "nope" } }).value).toBe("${B}")
  })

  it("leaves non-string leaves and the input untouched", () => {
    const tree: ConfigMapping = { n: 1, b: false, z: null, s: "${X:y}" }

    const resolved = resolvePlaceholders(tree, { env: {} })

    expect(resolved).toEqual({ n: 1, b: false, z: null, s: "y" })
    expect(tree.s).toBe("${X:y}")
  })

  it("looks up an explicit root instead of the value", () => {
    const resolved = resolvePlaceholders({ v: "${name}" }, { root: { name: "other" }, env: {} })

    expect(resolved).toEqual({ v: "other" })
  })

  it("uses only the environment when root is null", () => {
    const tree: ConfigMapping = { name: "svc", v: "${name:none}", w: "${HOME_DIR}" }

    expect(resolvePlaceholders(tree, { root: null, env: { HOME_DIR: "/h" } })).toEqual({
      name: "svc",
      v: "none",
      w: "/h",
    })
  })
})
