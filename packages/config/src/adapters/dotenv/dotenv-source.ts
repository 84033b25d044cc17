import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, isNotFoundError } from "../file/text-file-source"

/**
 * Reads a `.env` file into flat string values. Nothing is written to
 * `process.env`.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: FileSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return parse(content)
    } catch (err) {
      if (!this.opts.required && isNotFoundError(err)) {
        return {}
      }
      throw err
    }
  }
}
