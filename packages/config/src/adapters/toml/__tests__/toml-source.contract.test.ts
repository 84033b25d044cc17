import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { TomlSource } from "../toml-source"

describeConfigSourceContract({
  name: "TomlSource",
  setup: (cwd) =>
    fs.writeFile(path.join(cwd, "app.toml"), 'title = "svc"\n\n[server]\nport = 8080\ntags = ["a", "b"]\n'),
  make: (cwd) => new TomlSource({ file: "app.toml", required: true, cwd }),
  namePattern: /^toml:app\.toml$/,
  expected: { title: "svc", server: { port: 8080, tags: ["a", "b"] } },
})
