import { parse } from "smol-toml"
import { type FileSourceOptions, TextFileSource } from "../file/text-file-source"

/**
 * TOML 1.0. Date and time values load as their ISO text.
 */
export class TomlSource extends TextFileSource {
  constructor(opts: FileSourceOptions) {
    super("toml", opts)
  }

  protected parse(content: string): unknown {
    return parse(content)
  }
}
