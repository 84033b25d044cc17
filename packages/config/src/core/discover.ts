import type { Dirent } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { type ConfigFormat, isNotFoundError } from "../adapters/file/text-file-source"
import {
  CONFIG_EXTENSIONS,
  type ConfigExtension,
  FORMAT_BY_EXTENSION,
  isConfigExtension,
} from "./formats"

export type DiscoveredFile = {
  name: string
  path: string
  extension: ConfigExtension
  format: ConfigFormat
}

/**
 * Lists the recognised regular files directly inside `dir`, in merge order:
 * extension groups as in `CONFIG_EXTENSIONS`, names by code unit within a
 * group. Symbolic links count when they resolve to a regular file. Rejects
 * when the directory cannot be read.
 */
export async function discoverConfigFiles(dir: string): Promise<DiscoveredFile[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })

  const found = await Promise.all(
    entries.map(async (entry): Promise<DiscoveredFile | undefined> => {
      const extension = path.extname(entry.name)
      const file = path.join(dir, entry.name)

      if (!isConfigExtension(extension) || !(await isRegularFile(entry, file))) return undefined

      return { name: entry.name, path: file, extension, format: FORMAT_BY_EXTENSION[extension] }
    }),
  )

  return found.filter((file) => file !== undefined).sort(compareFiles)
}

async function isRegularFile(entry: Dirent, file: string): Promise<boolean> {
  if (!entry.isSymbolicLink()) return entry.isFile()

  try {
    return (await fs.stat(file)).isFile()
  } catch (err) {
    if (isNotFoundError(err) || isLinkLoop(err)) return false
    throw err
  }
}

function isLinkLoop(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ELOOP"
}

function compareFiles(a: DiscoveredFile, b: DiscoveredFile): number {
  const group = CONFIG_EXTENSIONS.indexOf(a.extension) - CONFIG_EXTENSIONS.indexOf(b.extension)

  if (group !== 0) return group

  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
}
