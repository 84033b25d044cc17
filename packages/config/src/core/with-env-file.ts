import { DotenvSource } from "../adapters/dotenv/dotenv-source"

export type EnvRecord = Readonly<Record<string, string | undefined>>

/**
 * Layers `env` over the entries of a `.env` file (relative to the working
 * directory). A missing file leaves `env` as it is.
 */
export async function withEnvFile(
  env: EnvRecord,
  envFile: string | undefined,
): Promise<EnvRecord> {
  if (envFile === undefined) return env

  const merged: Record<string, string> = await new DotenvSource({ file: envFile, required: false }).load()

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value
  }

  return merged
}
