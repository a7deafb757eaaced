import type { Logger } from "@knobs/logger"
import type { ApplyFn } from "./apply"
import type { Config, ConfigSelector, KeyPath } from "./config"

/**
 * Where a candidate value came from.
 */
export type Origin =
  | Readonly<{ type: "config"; config: Config; path: KeyPath }>
  | Readonly<{ type: "config-attr"; config: Config; property: string }>
  | Readonly<{ type: "default" }>
  | Readonly<{ type: "value" }>
  | Readonly<{ type: "func" }>
  | Readonly<{ type: "method" }>

export type Found = Readonly<{
  value: unknown
  origin: Origin
}>

/**
 * Everything a getter may consult while finding values for one parameter.
 */
export type ResolveContext = Readonly<{
  /** The object (or collection) the parameter belongs to. */
  target: object
  /** Field name, or the slot path inside a collection. */
  field: string
  /** Label used in messages, e.g. "Greeter.name". */
  label: string
  configs: readonly Config[]
  logger: Logger
  /**
   * Resolves another parameter of the same target, memoized for the current
   * load. Throws CircularDependencyError on cycles.
   */
  resolve(field: string): unknown
}>

/**
 * A declarative locator for candidate values.
 *
 * Getters hold no state and perform no I/O of their own, so calling `find`
 * again against the same configs yields the same sequence.
 */
export interface Getter {
  /** Replaces the parameter's apply function for values from this getter. */
  readonly apply?: ApplyFn | undefined

  /** Set by getters that read from configs; used by `strictKinds`. */
  readonly selector?: ConfigSelector | undefined

  find(configs: readonly Config[], ctx: ResolveContext): Iterable<Found>

  /** Short description for error messages, e.g. "cli <name>". */
  describe(): string
}
