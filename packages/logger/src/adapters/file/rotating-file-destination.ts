import * as fs from "node:fs"
import * as path from "node:path"
import type { DestinationStream } from "pino"

import { ConsoleLogger } from "../console/console-logger"

export type WriteErrorHandler = (err: unknown, file: string) => void

export interface RotatingFileOptions {
  file: string

  /**
   * Size threshold in bytes. A write that would take the file to this size
   * or beyond rolls it over first. `0` disables rotation.
   * @default 0
   */
  maxBytes?: number

  /**
   * Number of rolled-over files kept (`app.log.1` ... `app.log.N`).
   * `0` disables rotation.
   * @default 0
   */
  backupCount?: number

  /**
   * Create missing parent directories.
   * @default true
   */
  mkdir?: boolean

  /**
   * Receives write and rotation failures. The record that failed is dropped
   * and the destination keeps accepting writes.
   */
  onError?: WriteErrorHandler
}

const fallback = new ConsoleLogger({}, { level: "warn", name: "keel.logging" })

const reportToConsole: WriteErrorHandler = (err, file) => {
  fallback.warn("Log write failed", { file, err })
}

/**
 * Synchronous append-only file sink with size-based rotation.
 *
 * Holds one file descriptor from construction until `close()`. A failed
 * rotation reopens the base file so the descriptor never goes stale.
 */
export class RotatingFileDestination implements DestinationStream {
  readonly file: string
  private readonly maxBytes: number
  private readonly backupCount: number
  private readonly onError: WriteErrorHandler
  private fd: number | null
  private size = 0
  private closedByOwner = false

  constructor(options: RotatingFileOptions) {
    this.file = path.resolve(options.file)
    this.maxBytes = Math.max(0, options.maxBytes ?? 0)
    this.backupCount = Math.max(0, Math.floor(options.backupCount ?? 0))
    this.onError = options.onError ?? reportToConsole

    if (options.mkdir ?? true) {
      fs.mkdirSync(path.dirname(this.file), { recursive: true })
    }

    this.fd = null
    this.reopen()
  }

  get closed(): boolean {
    return this.closedByOwner
  }

  write(chunk: string): boolean {
    if (this.closedByOwner) return false

    const bytes = Buffer.byteLength(chunk)

    try {
      if (this.shouldRollover(bytes)) this.rollover()

      fs.writeSync(this.fd ?? this.reopen(), chunk)
      this.size += bytes

      return true
    } catch (err) {
      this.onError(err, this.file)
      return false
    }
  }

  close(): void {
    if (this.closedByOwner) return

    this.closedByOwner = true

    const fd = this.fd
    this.fd = null
    if (fd !== null) fs.closeSync(fd)
  }

  private shouldRollover(incoming: number): boolean {
    if (this.maxBytes === 0 || this.backupCount === 0) return false

    return this.size > 0 && this.size + incoming >= this.maxBytes
  }

  private rollover(): void {
    const fd = this.fd
    this.fd = null

    try {
      if (fd !== null) fs.closeSync(fd)

      for (let i = this.backupCount - 1; i >= 1; i--) {
        const from = `${this.file}.${i}`

        if (fs.existsSync(from)) {
          fs.renameSync(from, `${this.file}.${i + 1}`)
        }
      }

      fs.renameSync(this.file, `${this.file}.1`)
    } finally {
      this.reopen()
    }
  }

  private reopen(): number {
    const fd = fs.openSync(this.file, "a")
    this.fd = fd
    this.size = fs.fstatSync(fd).size

    return fd
  }
}
