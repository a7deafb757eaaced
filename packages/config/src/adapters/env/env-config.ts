import { BaseConfig } from "../../core/base-config"
import type { BaseConfigOptions } from "../../core/base-config"

export type EnvConfigOptions = BaseConfigOptions & {
  /** Only variables starting with `prefix`, with the prefix stripped. */
  prefix?: string

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Environment variables as a flat mapping, snapshotted on first access.
 */
export class EnvConfig extends BaseConfig {
  private readonly prefix: string | undefined
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvConfigOptions = {}) {
    super({ kind: "env", name: options.prefix ? `env:${options.prefix}` : "env" }, options)
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  protected materialize(): Record<string, string> {
    const vars: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined) continue

      if (!this.prefix) {
        vars[key] = value
      } else if (key.startsWith(this.prefix)) {
        vars[key.slice(this.prefix.length)] = value
      }
    }

    return vars
  }
}
