export type KeySegment = string | number

/**
 * A parsed key path: mapping keys and sequence indices, outermost first.
 */
export type KeyPath = readonly KeySegment[]

/**
 * Either a parsed key path or its string form, e.g. `"server.hosts[0]"` or
 * `'labels["app.kubernetes.io/name"]'`.
 */
export type KeyPathInput = string | KeyPath

/**
 * Picks configs by kind, optionally narrowed to one tag.
 *
 * @example "env", { kind: "json", tag: "user" }
 */
export type ConfigSelector = string | Readonly<{ kind: string; tag?: string }>

/**
 * A named, lazily-materialized source of configuration data.
 *
 * A Config is only responsible for *finding* raw values. It does not
 * transform values, or decide which of several sources wins.
 */
export interface Config {
  /** Matched by getters' selectors, e.g. "env", "json", "cli". */
  readonly kind: string

  /** Distinguishes several configs of the same kind. */
  readonly tag?: string | undefined

  /**
   * Human-readable name for provenance and error messages.
   * Example: "env", "dotenv:.env.defaults", "json:config.json"
   */
  readonly name: string

  /**
   * Whether `path` leads to a present value.
   *
   * Never throws for missing intermediate containers; `false`, `0`, `""`
   * and `null` are present, `undefined` is not.
   */
  exists(path: KeyPathInput): boolean

  /**
   * The raw value at `path`. Throws KeyNotFoundError when `exists(path)`
   * would be false, and ConfigLoadError when the data cannot be loaded.
   */
  get(path: KeyPathInput): unknown

  /** Pure comparison of this config's kind and tag against `selector`. */
  matches(selector: ConfigSelector): boolean
}

/**
 * A Config read from a file, so values can be interpreted relative to it.
 */
export interface FileConfig extends Config {
  /** Absolute path of the backing file. */
  readonly file: string
}

/**
 * What a config provider may return: a Config, or any (nested) iterable of
 * them, including generators. Flattened in encounter order.
 */
export type ConfigTree = Config | Iterable<ConfigTree>
