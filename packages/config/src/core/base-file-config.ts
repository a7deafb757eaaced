import fs from "node:fs"
import path from "node:path"
import type { FileConfig } from "../ports/config"
import { BaseConfig } from "./base-config"
import type { BaseConfigOptions } from "./base-config"

export type FileConfigOptions = BaseConfigOptions & {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/app.yaml"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Fails to load if the file is missing.
   * - `false`: Empty config if the file is missing; `schema` is not applied.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * A config read synchronously from one file on first access.
 */
export abstract class BaseFileConfig extends BaseConfig implements FileConfig {
  readonly file: string
  private readonly required: boolean

  protected constructor(kind: string, options: FileConfigOptions) {
    super({ kind, name: `${kind}:${options.file}` }, options)
    this.file = path.resolve(options.cwd ?? process.cwd(), options.file)
    this.required = options.required
  }

  protected abstract parse(content: string): unknown

  protected materialize(): unknown {
    let content: string

    try {
      content = fs.readFileSync(this.file, "utf-8")
    } catch (err) {
      if (!this.required && isMissingFile(err)) {
        return undefined
      }
      throw err
    }

    return this.parse(content)
  }
}
