import { type FileSourceOptions, TextFileSource } from "../file/text-file-source"

export class JsonSource extends TextFileSource {
  constructor(opts: FileSourceOptions) {
    super("json", opts)
  }

  protected parse(content: string): unknown {
    return JSON.parse(content)
  }
}
