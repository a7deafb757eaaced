import type { ApplyFn } from "../ports/apply"
import type { Config, ConfigSelector, KeyPath, KeyPathInput } from "../ports/config"
import type { Found, Getter, ResolveContext } from "../ports/getter"
import { formatKeyPath, parseKeyPath } from "./key-path"
import { describeSelector } from "./selector"

export type GetterOptions = {
  /** Used instead of the parameter's apply for values from this getter. */
  apply?: ApplyFn | undefined
}

/**
 * Looks `path` up in every config matching `selector`, in order.
 */
export class KeyGetter implements Getter {
  readonly path: KeyPath
  readonly apply: ApplyFn | undefined

  constructor(
    readonly selector: ConfigSelector,
    path: KeyPathInput,
    options: GetterOptions = {},
  ) {
    this.path = parseKeyPath(path)
    this.apply = options.apply
  }

  *find(configs: readonly Config[], _ctx: ResolveContext): Generator<Found> {
    for (const config of configs) {
      if (!config.matches(this.selector) || !config.exists(this.path)) continue

      yield { value: config.get(this.path), origin: { type: "config", config, path: this.path } }
    }
  }

  describe(): string {
    return `${describeSelector(this.selector)} ${formatKeyPath(this.path)}`
  }
}

/**
 * Reads a property of each matching Config object itself, e.g. the usage
 * text of a CLI config. Properties holding `undefined` are skipped.
 */
export class ConfigAttrGetter implements Getter {
  readonly apply: ApplyFn | undefined

  constructor(
    readonly selector: ConfigSelector,
    readonly property: string,
    options: GetterOptions = {},
  ) {
    this.apply = options.apply
  }

  *find(configs: readonly Config[], _ctx: ResolveContext): Generator<Found> {
    for (const config of configs) {
      if (!config.matches(this.selector)) continue

      const value: unknown = Reflect.get(config, this.property)
      if (value === undefined) continue

      yield { value, origin: { type: "config-attr", config, property: this.property } }
    }
  }

  describe(): string {
    return `${describeSelector(this.selector)} #${this.property}`
  }
}

export class ValueGetter implements Getter {
  readonly apply: ApplyFn | undefined

  constructor(
    readonly value: unknown,
    options: GetterOptions = {},
  ) {
    this.apply = options.apply
  }

  *find(_configs: readonly Config[], _ctx: ResolveContext): Generator<Found> {
    yield { value: this.value, origin: { type: "value" } }
  }

  describe(): string {
    return "value"
  }
}

export class FuncGetter implements Getter {
  readonly apply: ApplyFn | undefined

  constructor(
    private readonly fn: () => unknown,
    options: GetterOptions = {},
  ) {
    this.apply = options.apply
  }

  *find(_configs: readonly Config[], _ctx: ResolveContext): Generator<Found> {
    yield { value: this.fn(), origin: { type: "func" } }
  }

  describe(): string {
    return "func"
  }
}

export type MethodFn<T extends object = object> = (target: T, ctx: ResolveContext) => unknown

/**
 * Computes a value from the object being loaded. `ctx.resolve(name)` gives
 * access to the object's other parameters.
 */
export class MethodGetter implements Getter {
  readonly apply: ApplyFn | undefined

  constructor(
    private readonly fn: MethodFn,
    options: GetterOptions = {},
  ) {
    this.apply = options.apply
  }

  *find(_configs: readonly Config[], ctx: ResolveContext): Generator<Found> {
    yield { value: this.fn(ctx.target, ctx), origin: { type: "method" } }
  }

  describe(): string {
    return "method"
  }
}

export function key(selector: ConfigSelector, path: KeyPathInput, options?: GetterOptions): KeyGetter {
  return new KeyGetter(selector, path, options)
}

export function configAttr(selector: ConfigSelector, property: string, options?: GetterOptions): ConfigAttrGetter {
  return new ConfigAttrGetter(selector, property, options)
}

export function value(v: unknown, options?: GetterOptions): ValueGetter {
  return new ValueGetter(v, options)
}

export function func(fn: () => unknown, options?: GetterOptions): FuncGetter {
  return new FuncGetter(fn, options)
}

export function method(fn: MethodFn, options?: GetterOptions): MethodGetter {
  return new MethodGetter(fn, options)
}
