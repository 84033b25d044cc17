import { type FileSourceOptions, TextFileSource } from "../file/text-file-source"
import { parseIni } from "./parse-ini"

/**
 * INI / `.conf` files. Each `[section]` becomes a flat mapping of string
 * values; keys before the first section stay at the top level.
 */
export class IniSource extends TextFileSource {
  constructor(opts: FileSourceOptions) {
    super("ini", opts)
  }

  protected parse(content: string): unknown {
    return parseIni(content)
  }
}
