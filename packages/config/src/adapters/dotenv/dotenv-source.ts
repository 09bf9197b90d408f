import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { pickPrefixed } from "../../core/utils/pick-prefixed"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  path: string

  /** A missing file contributes no values instead of failing the load. */
  optional?: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Keep only keys with this prefix, stripped, the same way {@link EnvSource} does. */
  prefix?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Values from a `.env` file, parsed with dotenv. The file is read on every
 * `load()`; nothing is written to `process.env`.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string
  private readonly filePath: string

  constructor(private readonly options: DotenvSourceOptions) {
    this.name = `dotenv:${options.path}`
    this.filePath = path.resolve(options.cwd ?? process.cwd(), options.path)
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await this.read()
    if (content === undefined) return {}

    return pickPrefixed(parse(content), this.options.prefix)
  }

  private async read(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.filePath, "utf8")
    } catch (err) {
      if (this.options.optional && isMissingFile(err)) return undefined

      throw err
    }
  }
}
