import { BaseFileConfig } from "../../core/base-file-config"
import type { FileConfigOptions } from "../../core/base-file-config"

export type JsonConfigOptions = FileConfigOptions

/**
 * Kind "json" unless overridden; named `json:<file>`.
 */
export class JsonConfig extends BaseFileConfig {
  constructor(options: JsonConfigOptions) {
    super("json", options)
  }

  protected parse(content: string): unknown {
    return JSON.parse(content)
  }
}
