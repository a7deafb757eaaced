import { parse } from "yaml"
import { BaseFileConfig } from "../../core/base-file-config"
import type { FileConfigOptions } from "../../core/base-file-config"

export type YamlConfigOptions = FileConfigOptions

/**
 * Kind "yaml" unless overridden; named `yaml:<file>`. An empty document
 * yields no keys.
 */
export class YamlConfig extends BaseFileConfig {
  constructor(options: YamlConfigOptions) {
    super("yaml", options)
  }

  protected parse(content: string): unknown {
    const doc: unknown = parse(content)
    return doc ?? {}
  }
}
