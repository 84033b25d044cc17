import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { collectDirectories, ensureDirectories } from "../ensure-directories"
import { CaptureLogger } from "./capture-logger"

describe("collectDirectories", () => {
  it("takes strings under dir/path keys and string sequence elements", () => {
    expect(
      collectDirectories({
        logs: { dir: "/a", file: "/a/app.log", archivePath: "/b" },
        DATA_DIR: "/c",
        extra: ["/d", 1, { dir: "/skipped" }],
        name: "ignored",
      }),
    ).toEqual(["/a", "/b", "/c", "/d"])
  })

  it("accepts a sequence at the top and ignores scalars", () => {
    expect(collectDirectories(["/x", "/y"])).toEqual(["/x", "/y"])
    expect(collectDirectories("/z")).toEqual([])
    expect(collectDirectories(undefined)).toEqual([])
  })
})

describe("ensureDirectories", () => {
  let root: string

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "ensure-dirs-"))
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it("creates nested directories including parents", async () => {
    const target = path.join(root, "a", "b", "c")

    await ensureDirectories({ logs: { dir: target } })

    expect((await fs.stat(target)).isDirectory()).toBe(true)
  })

  it("logs a warning and continues when a directory cannot be created", async () => {
    const blocker = path.join(root, "file")
    await fs.writeFile(blocker, "")
    const good = path.join(root, "good")
    const logger = new CaptureLogger()

    await ensureDirectories({ bad_dir: path.join(blocker, "sub"), good_dir: good }, logger)

    expect((await fs.stat(good)).isDirectory()).toBe(true)
    expect(logger.entries).toHaveLength(1)
    expect(logger.entries[0]).toMatchObject({
      level: "warn",
      meta: { dir: path.join(blocker, "sub") },
    })
  })
})
