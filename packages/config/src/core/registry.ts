import type { ConfigTree } from "../ports/config"
import { UsageError } from "./errors"
import { Param } from "./param"

export type Class<T extends object = object> = abstract new (...args: never[]) => T

/**
 * Parameters for some of `T`'s fields. The parameter's type must match the
 * field's.
 */
export type ParamDeclarations<T> = { readonly [K in keyof T & string]?: Param<T[K]> }

export type ConfigProvider<T> = (target: T) => ConfigTree

const declaredParams = new WeakMap<object, ReadonlyMap<string, Param>>()
const declaredProviders = new WeakMap<object, ConfigProvider<object>>()

function prototypeOf(cls: Class): object {
  const proto: unknown = cls.prototype
  if (typeof proto !== "object" || proto === null) {
    throw new UsageError(`${cls.name || "class"} has no prototype to declare parameters on`)
  }
  return proto
}

/** Prototype chain of `target`, nearest first. */
function* prototypes(target: object): Generator<object> {
  for (
    let proto: unknown = Object.getPrototypeOf(target);
    typeof proto === "object" && proto !== null;
    proto = Object.getPrototypeOf(proto)
  ) {
    yield proto
  }
}

/**
 * Declares parameters for instances of `cls`. May be called more than once
 * per class; declaring the same name twice is an error.
 */
export function defineParams<T extends object>(cls: Class<T>, params: ParamDeclarations<T>): void {
  const proto = prototypeOf(cls)
  const merged = new Map(declaredParams.get(proto))
  const entries: [string, unknown][] = Object.entries(params)

  for (const [name, declared] of entries) {
    if (declared === undefined) continue
    if (!(declared instanceof Param)) {
      throw new UsageError(`${cls.name}.${name} is not a parameter; declare it with param()`)
    }
    if (merged.has(name)) {
      throw new UsageError(`parameter ${name} is declared twice on ${cls.name}`, {
        context: { param: `${cls.name}.${name}` },
      })
    }
    merged.set(name, declared)
  }

  declaredParams.set(proto, merged)
}

/**
 * Registers where instances of `cls` (and subclasses without their own
 * provider) get their configs. Called once per load.
 */
export function defineConfigs<T extends object>(cls: Class<T>, provider: ConfigProvider<T>): void {
  const proto = prototypeOf(cls)

  if (declaredProviders.has(proto)) {
    throw new UsageError(`${cls.name} already has a config provider`)
  }

  declaredProviders.set(proto, (target) => {
    if (!(target instanceof cls)) {
      throw new UsageError(`config provider of ${cls.name} called for an unrelated object`)
    }
    return provider(target)
  })
}

/**
 * Declared parameters of `target`, base classes first. A subclass
 * redeclaring a name replaces the base's parameter in its original position.
 */
export function getDeclaredParams(target: object): ReadonlyMap<string, Param> {
  const params = new Map<string, Param>()

  for (const proto of [...prototypes(target)].reverse()) {
    for (const [name, declared] of declaredParams.get(proto) ?? []) {
      params.set(name, declared)
    }
  }

  return params
}

export function hasDeclaredParams(target: object): boolean {
  for (const proto of prototypes(target)) {
    if ((declaredParams.get(proto)?.size ?? 0) > 0) return true
  }
  return false
}

/** The nearest provider on `target`'s prototype chain. */
export function findProvider(target: object): ConfigProvider<object> | undefined {
  for (const proto of prototypes(target)) {
    const provider = declaredProviders.get(proto)
    if (provider !== undefined) return provider
  }
  return undefined
}

export function describeTarget(target: object): string {
  const ctor: unknown = Reflect.get(target, "constructor")
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object"
}
