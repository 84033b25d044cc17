import * as fs from "node:fs"
import * as os from "node:os"
import * as path from "node:path"

import { RotatingFileDestination } from "../rotating-file-destination"

describe("RotatingFileDestination", () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "keel-rotate-"))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  const read = (file: string) => fs.readFileSync(file, "utf8")

  it("creates missing parent directories and appends lines", () => {
    const file = path.join(dir, "nested", "logs", "app.log")
    const dest = new RotatingFileDestination({ file })

    dest.write("one\n")
    dest.write("two\n")
    dest.close()

    expect(read(file)).toBe("one\ntwo\n")
  })

  it("appends to an existing file instead of truncating it", () => {
    const file = path.join(dir, "app.log")
    fs.writeFileSync(file, "existing\n")

    const dest = new RotatingFileDestination({ file })
    dest.write("next\n")
    dest.close()

    expect(read(file)).toBe("existing\nnext\n")
  })

  it("rolls over by size and keeps at most backupCount files", () => {
    const file = path.join(dir, "app.log")
    const dest = new RotatingFileDestination({ file, maxBytes: 10, backupCount: 2 })

    for (const id of ["a", "b", "c", "d"]) {
      dest.write(`line-${id}\n`)
    }
    dest.close()

    expect(read(file)).toBe("line-d\n")
    expect(read(`${file}.1`)).toBe("line-c\n")
    expect(read(`${file}.2`)).toBe("line-b\n")
    expect(fs.existsSync(`${file}.3`)).toBe(false)
  })

  it("never rotates when backupCount is 0", () => {
    const file = path.join(dir, "app.log")
    const dest = new RotatingFileDestination({ file, maxBytes: 10, backupCount: 0 })

    dest.write("line-a\n")
    dest.write("line-b\n")
    dest.close()

    expect(read(file)).toBe("line-a\nline-b\n")
    expect(fs.existsSync(`${file}.1`)).toBe(false)
  })

  it("ignores writes after close and closes idempotently", () => {
    const file = path.join(dir, "app.log")
    const dest = new RotatingFileDestination({ file })

    dest.write("kept\n")
    dest.close()
    dest.close()

    expect(dest.closed).toBe(true)
    expect(dest.write("dropped\n")).toBe(false)
    expect(read(file)).toBe("kept\n")
  })

  it("keeps a live descriptor and reports when a rollover rename fails", () => {
    const file = path.join(dir, "app.log")
    fs.mkdirSync(`${file}.1`)
    fs.writeFileSync(path.join(`${file}.1`, "blocker"), "x")

    const failures: Array<{ err: unknown; file: string }> = []
    const dest = new RotatingFileDestination({
      file,
      maxBytes: 20,
      backupCount: 1,
      onError: (err, failed) => failures.push({ err, file: failed }),
    })

    expect(dest.write("first line\n")).toBe(true)
    expect(dest.write("second line\n")).toBe(false)
    expect(failures).toEqual([{ err: expect.any(Error), file }])

    const other = fs.openSync(path.join(dir, "other.txt"), "w")
    expect(dest.write("third\n")).toBe(true)
    expect(() => fs.closeSync(other)).not.toThrow()

    fs.rmSync(`${file}.1`, { recursive: true })
    expect(dest.write("fourth line\n")).toBe(true)
    expect(() => dest.close()).not.toThrow()

    expect(read(`${file}.1`)).toBe("first line\nthird\n")
    expect(read(file)).toBe("fourth line\n")
    expect(failures).toHaveLength(1)
  })
})
