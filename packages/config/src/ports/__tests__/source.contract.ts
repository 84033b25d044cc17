import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { type ConfigMapping, isConfigMapping, isConfigValue } from "../config-tree"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  /** Writes whatever files the source reads into `cwd`. */
  setup?: (cwd: string) => Promise<void>
  make: (cwd: string) => ConfigSource
  /** Expected `name`, e.g. /^yaml:/. */
  namePattern: RegExp
  expected: ConfigMapping
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-source-"))
      await h.setup?.(cwd)
      source = h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("names its kind", () => {
      expect(source.name).toMatch(h.namePattern)
    })

    it("loads a mapping of config values", async () => {
      const fragment = await source.load()

      expect(isConfigMapping(fragment)).toBe(true)
      expect(Object.values(fragment).every(isConfigValue)).toBe(true)
    })

    it("loads the expected fragment", async () => {
      expect(await source.load()).toEqual(h.expected)
    })

    it("returns a fresh fragment on every load", async () => {
      const first = await source.load()

      for (const [key, value] of Object.entries(first)) {
        if (isConfigMapping(value)) value.__mutated__ = true
        else first[key] = "__mutated__"
      }
      first.__added__ = 1

      expect(await source.load()).toEqual(h.expected)
    })
  })
}
