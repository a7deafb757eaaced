import { parse } from "smol-toml"
import { BaseFileConfig } from "../../core/base-file-config"
import type { FileConfigOptions } from "../../core/base-file-config"

export type TomlConfigOptions = FileConfigOptions

/**
 * Kind "toml" unless overridden; named `toml:<file>`. Combine with `rootKey`
 * to read one table, e.g. `tool.greeter` in a pyproject-style file.
 */
export class TomlConfig extends BaseFileConfig {
  constructor(options: TomlConfigOptions) {
    super("toml", options)
  }

  protected parse(content: string): unknown {
    return parse(content)
  }
}
