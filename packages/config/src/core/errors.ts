import { BaseError, toAppError } from "@knobs/errors"
import type { BaseErrorOptions } from "@knobs/errors"

type ExtraOptions = Omit<BaseErrorOptions, "code">

/**
 * The library was used incorrectly: a bad declaration, a malformed key path,
 * a provider yielding something that is not a Config.
 */
export class UsageError extends BaseError<"usage"> {
  constructor(message: string, options: ExtraOptions = {}) {
    super(message, { isOperational: false, ...options, code: "usage" })
  }
}

export class CircularDependencyError extends UsageError {
  /** Labels of the parameters in the cycle, first repeated at the end. */
  readonly chain: readonly string[]

  constructor(chain: readonly string[]) {
    super(`circular dependency between parameters: ${chain.join(" -> ")}`, {
      context: { chain },
    })
    this.chain = Object.freeze([...chain])
  }
}

export class NoValueFoundError extends BaseError<"no_value"> {
  readonly param: string

  constructor(param: string, options: ExtraOptions & Readonly<{ reason?: string }> = {}) {
    const { reason, ...rest } = options
    super(reason === undefined ? `no value found for ${param}` : `no value found for ${param}: ${reason}`, {
      ...rest,
      context: { ...rest.context, param },
      code: "no_value",
    })
    this.param = param
  }
}

export type UnresolvedParam = Readonly<{
  error: NoValueFoundError
  /** Descriptions of the getters that were consulted. */
  tried: readonly string[]
}>

/**
 * Every parameter of one object that ended without a value.
 */
export class ResolutionError extends BaseError<"resolution"> {
  readonly unresolved: readonly UnresolvedParam[]

  constructor(subject: string, unresolved: readonly UnresolvedParam[], options: ExtraOptions = {}) {
    const count = unresolved.length === 1 ? "1 parameter" : `${unresolved.length} parameters`
    const lines = unresolved.map(({ error, tried }) =>
      tried.length === 0 ? `  ${error.message} (no getters declared)` : `  ${error.message} (tried ${tried.join(", ")})`,
    )
    super([`cannot load ${subject}: ${count} could not be resolved`, ...lines].join("\n"), {
      ...options,
      context: { ...options.context, subject, params: unresolved.map(({ error }) => error.param) },
      code: "resolution",
    })
    this.unresolved = Object.freeze([...unresolved])
  }

  get params(): readonly string[] {
    return this.unresolved.map(({ error }) => error.param)
  }
}

export class KeyNotFoundError extends BaseError<"key_not_found"> {
  constructor(configName: string, keyPath: string) {
    super(`key ${keyPath} not found in ${configName}`, {
      context: { config: configName, keyPath },
      code: "key_not_found",
    })
  }
}

export class ConfigLoadError extends BaseError<"config_load"> {
  constructor(configName: string, options: ExtraOptions & Readonly<{ reason?: string }> = {}) {
    const { reason, ...rest } = options
    super(reason === undefined ? `failed to load ${configName}` : `failed to load ${configName}: ${reason}`, {
      ...rest,
      context: { ...rest.context, config: configName },
      code: "config_load",
    })
  }
}

export class ApplyError extends BaseError<"apply"> {
  readonly param: string

  constructor(param: string, source: string, cause: unknown) {
    const detail = toAppError(cause, "apply").message
    super(`invalid value for ${param} from ${source}: ${detail}`, {
      context: { param, source },
      cause,
      code: "apply",
    })
    this.param = param
  }
}

export class PickError extends BaseError<"pick"> {
  constructor(param: string, reason: string, options: ExtraOptions = {}) {
    super(`cannot pick a value for ${param}: ${reason}`, {
      ...options,
      context: { ...options.context, param },
      code: "pick",
    })
  }
}
