import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-source-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("reads flat string values, unquoting and skipping comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      ["# log settings", "LOG_DIR='/var/log/svc'", 'LOG_LEVEL="debug"', "PORT=8080"].join("\n"),
    )

    expect(await new DotenvSource({ file: ".env", required: true, cwd }).load()).toEqual({
      LOG_DIR: "/var/log/svc",
      LOG_LEVEL: "debug",
      PORT: "8080",
    })
  })

  it("resolves an optional missing file to an empty mapping", async () => {
    expect(await new DotenvSource({ file: ".env", required: false, cwd }).load()).toEqual({})
  })

  it("rejects a required missing file", async () => {
    await expect(new DotenvSource({ file: ".env", required: true, cwd }).load()).rejects.toMatchObject({
      code: "ENOENT",
    })
  })

  it("does not write to process.env", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "KEEL_DOTENV_MARKER=1")

    await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(process.env.KEEL_DOTENV_MARKER).toBeUndefined()
  })

  it("is named after the file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false }).name).toBe("dotenv:.env.local")
  })
})
