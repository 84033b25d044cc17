import { parse } from "yaml"
import { type FileSourceOptions, TextFileSource } from "../file/text-file-source"

/**
 * YAML 1.2 core schema. An empty document loads as an empty mapping.
 */
export class YamlSource extends TextFileSource {
  constructor(opts: FileSourceOptions) {
    super("yaml", opts)
  }

  protected parse(content: string): unknown {
    return parse(content) ?? {}
  }
}
