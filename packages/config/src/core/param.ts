import type { ApplyFn } from "../ports/apply"
import type { Found, Getter, Origin, ResolveContext } from "../ports/getter"
import type { OnLoadFn, PickedOrigin, PickFn } from "../ports/pick"
import { identity, pipeline } from "./apply"
import { ApplyError } from "./errors"
import { describeOrigin } from "./origin"
import { pickPolicies } from "./pick"
import type { PickPolicy } from "./pick"
import { CandidateValues } from "./values-iter"

export type ParamOptions = {
  /** Applied to every found value, unless its getter has its own. A list composes left to right. */
  apply?: ApplyFn | readonly ApplyFn[]

  /** @default "first" */
  pick?: PickFn | PickPolicy

  /**
   * Found after every getter. Goes through the parameter's apply like any
   * other value. An explicit `undefined` counts as a default.
   */
  default?: unknown

  onLoad?: OnLoadFn
}

export type Resolved = Readonly<{ value: unknown; origin: PickedOrigin }>

const DEFAULT_ORIGIN: Origin = { type: "default" }

/**
 * A declared configuration parameter. `T` only records the type of the
 * field the parameter is declared for.
 */
export class Param<T = unknown> {
  declare readonly __value?: T

  readonly getters: readonly Getter[]
  readonly apply: ApplyFn
  readonly pick: PickFn
  readonly hasDefault: boolean
  readonly defaultValue: unknown
  readonly onLoad: OnLoadFn | undefined

  constructor(getters: readonly Getter[], options: ParamOptions = {}) {
    this.getters = Object.freeze([...getters])
    this.apply = options.apply === undefined ? identity : pipeline(options.apply)
    this.pick = typeof options.pick === "string" ? pickPolicies[options.pick] : (options.pick ?? pickPolicies.first)
    this.hasDefault = Object.hasOwn(options, "default")
    this.defaultValue = options.default
    this.onLoad = options.onLoad
  }

  /** What resolution consults, for error messages. */
  tried(): string[] {
    const tried = this.getters.map((getter) => getter.describe())
    return this.hasDefault ? [...tried, "default"] : tried
  }

  /**
   * Runs the getters lazily, applies each value, and lets the pick function
   * decide. NoValueFoundError from the pick propagates to the caller.
   */
  resolve(ctx: ResolveContext): Resolved {
    const values = new CandidateValues(ctx.label, () => this.candidates(ctx))
    const value = this.pick(values)

    return { value, origin: values.origin }
  }

  private *candidates(ctx: ResolveContext): Generator<readonly [unknown, Origin]> {
    for (const getter of this.getters) {
      const apply = getter.apply ?? this.apply

      for (const found of getter.find(ctx.configs, ctx)) {
        yield [this.applyTo(apply, found, ctx), found.origin]
      }
    }

    if (this.hasDefault) {
      yield [this.applyTo(this.apply, { value: this.defaultValue, origin: DEFAULT_ORIGIN }, ctx), DEFAULT_ORIGIN]
    }
  }

  private applyTo(apply: ApplyFn, found: Found, ctx: ResolveContext): unknown {
    const source = describeOrigin(found.origin)
    ctx.logger.trace("candidate value", { param: ctx.label, source })

    try {
      return apply(found.value, { target: ctx.target, field: ctx.field, label: ctx.label, origin: found.origin })
    } catch (err) {
      if (err instanceof ApplyError) throw err
      throw new ApplyError(ctx.label, source, err)
    }
  }
}

/**
 * Declares a parameter.
 *
 * @example
 * param([key("cli", "--port"), key("env", "PORT")], { apply: schema(z.coerce.number()), default: 8080 })
 */
export function param<T = unknown>(getters: readonly Getter[] = [], options?: ParamOptions): Param<T> {
  return new Param<T>(getters, options)
}
