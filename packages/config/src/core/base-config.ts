import { toAppError } from "@knobs/errors"
import { z } from "zod"
import type { ZodType } from "zod"
import type { Config, ConfigSelector, KeyPath, KeyPathInput } from "../ports/config"
import { ConfigLoadError, KeyNotFoundError } from "./errors"
import { formatKeyPath, lookup, parseKeyPath } from "./key-path"
import { matchesSelector } from "./selector"

export type BaseConfigOptions = {
  /** Overrides the adapter's default kind. */
  kind?: string

  tag?: string

  /** Overrides the adapter's default name. */
  name?: string

  /**
   * Validates the materialized data (after `rootKey`). A failed parse is a
   * load failure.
   */
  schema?: ZodType

  /**
   * Makes a sub-tree of the data the root. A missing root key leaves the
   * config empty.
   *
   * @example "tool.myapp"
   */
  rootKey?: KeyPathInput
}

type Identity = Readonly<{ kind: string; name: string }>

/**
 * Base for Config adapters: everything derives from one `materialize()`.
 *
 * Data is materialized on first access and kept for the life of the
 * instance. A failed materialization is not kept, so the next access tries
 * again.
 */
export abstract class BaseConfig implements Config {
  readonly kind: string
  readonly tag: string | undefined
  readonly name: string

  private readonly schema: ZodType | undefined
  private readonly rootKey: KeyPath | undefined
  private cache: { data: unknown } | undefined

  protected constructor(defaults: Identity, options: BaseConfigOptions = {}) {
    this.kind = options.kind ?? defaults.kind
    this.tag = options.tag
    this.name = options.name ?? defaults.name
    this.schema = options.schema
    this.rootKey = options.rootKey === undefined ? undefined : parseKeyPath(options.rootKey)
  }

  /** Reads the backing store. Called at most once per successful load. */
  protected abstract materialize(): unknown

  get loaded(): boolean {
    return this.cache !== undefined
  }

  /** The materialized data, loading it if needed. */
  get data(): unknown {
    if (this.cache === undefined) {
      this.cache = { data: this.load() }
    }

    return this.cache.data
  }

  /** Drops memoized data; the next access materializes again. */
  invalidate(): void {
    this.cache = undefined
  }

  exists(path: KeyPathInput): boolean {
    return lookup(this.data, parseKeyPath(path)).found
  }

  get(path: KeyPathInput): unknown {
    const keyPath = parseKeyPath(path)
    const result = lookup(this.data, keyPath)

    if (!result.found) {
      throw new KeyNotFoundError(this.name, formatKeyPath(keyPath))
    }

    return result.value
  }

  matches(selector: ConfigSelector): boolean {
    return matchesSelector(selector, this.kind, this.tag)
  }

  private load(): unknown {
    let data: unknown

    try {
      data = this.materialize()
    } catch (err) {
      if (err instanceof ConfigLoadError) throw err
      throw new ConfigLoadError(this.name, {
        reason: toAppError(err, "config_load").message,
        cause: err,
      })
    }

    if (this.rootKey !== undefined) {
      const root = lookup(data, this.rootKey)
      data = root.found ? root.value : undefined
    }

    if (this.schema !== undefined && data !== undefined) {
      const result = this.schema.safeParse(data)

      if (!result.success) {
        throw new ConfigLoadError(this.name, {
          reason: z.prettifyError(result.error),
          cause: result.error,
        })
      }

      data = result.data
    }

    return data
  }
}
