import { parse } from "dotenv"
import { BaseFileConfig } from "../../core/base-file-config"
import type { FileConfigOptions } from "../../core/base-file-config"

export type DotenvConfigOptions = FileConfigOptions

/**
 * Reads a .env file without touching `process.env`. All values are strings.
 */
export class DotenvConfig extends BaseFileConfig {
  constructor(options: DotenvConfigOptions) {
    super("dotenv", options)
  }

  protected parse(content: string): Record<string, string> {
    return parse(content)
  }
}
