import { BaseConfig } from "../../core/base-config"
import type { BaseConfigOptions } from "../../core/base-config"

/**
 * In-memory data, e.g. overrides or values computed at startup. Kind
 * "object" unless overridden.
 */
export class ObjectConfig extends BaseConfig {
  constructor(
    private readonly source: unknown,
    options: BaseConfigOptions = {},
  ) {
    super({ kind: "object", name: "object" }, options)
  }

  protected materialize(): unknown {
    return this.source
  }
}
