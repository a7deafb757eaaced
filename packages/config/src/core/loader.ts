import type { Logger } from "@knobs/logger"
import { createNullLogger } from "@knobs/logger"
import type { Config, ConfigTree } from "../ports/config"
import type { PickedOrigin } from "../ports/pick"
import { flattenConfigs } from "./config-tree"
import { UsageError } from "./errors"
import { describePicked, pickedSources } from "./origin"
import type { Param } from "./param"
import { describeTarget, findProvider, getDeclaredParams } from "./registry"
import { Resolver } from "./resolver"
import type { Slot } from "./resolver"
import { describeSelector } from "./selector"

export type LoaderOptions = {
  /** Used instead of the target's registered provider. */
  configs?: ConfigTree

  /** @default a NullLogger */
  logger?: Logger

  /**
   * Reject parameters reading a config kind the provider never yields.
   *
   * @default false
   */
  strictKinds?: boolean
}

/**
 * Where each field's value came from, after a successful load.
 */
export class LoadReport<T extends object> {
  constructor(
    readonly target: T,
    readonly configs: readonly Config[],
    private readonly origins: ReadonlyMap<string, PickedOrigin>,
  ) {}

  get fields(): string[] {
    return [...this.origins.keys()]
  }

  origin(field: keyof T & string): PickedOrigin {
    if (!this.origins.has(field)) {
      throw new UsageError(`${describeTarget(this.target)}.${field} was not loaded`)
    }
    return this.origins.get(field)
  }

  /**
   * Source description, e.g. "json:app.json greeting" or "default".
   */
  explain(field: keyof T & string): string {
    return describePicked(this.origin(field))
  }

  sourcesUsed(): string[] {
    return [...new Set([...this.origins.values()].flatMap(pickedSources))]
  }
}

function checkKinds(subject: string, params: ReadonlyMap<string, Param>, configs: readonly Config[]): void {
  for (const [field, declared] of params) {
    for (const getter of declared.getters) {
      const selector = getter.selector
      if (selector === undefined || configs.some((config) => config.matches(selector))) continue

      throw new UsageError(
        `${subject}.${field} reads from ${describeSelector(selector)} configs, but the provider yields none`,
        {
          context: { param: `${subject}.${field}`, available: configs.map((config) => config.name) },
          hints: ["add the config to the provider, or load with strictKinds: false"],
        },
      )
    }
  }
}

/**
 * Resolves the declared parameters of objects and assigns the values.
 *
 * Holds no state between calls; every `load` asks the provider for fresh
 * configs.
 */
export class Loader {
  private readonly logger: Logger

  constructor(private readonly options: LoaderOptions = {}) {
    this.logger = options.logger ?? createNullLogger()
  }

  load<T extends object>(target: T): LoadReport<T> {
    const subject = describeTarget(target)
    const params = getDeclaredParams(target)
    const configs = this.configsFor(target)
    const logger: Logger = this.logger.child({ target: subject })

    logger.debug("loading parameters", {
      params: [...params.keys()],
      configs: configs.map((config) => config.name),
    })

    if (this.options.strictKinds === true) {
      checkKinds(subject, params, configs)
    }

    const slots: Slot[] = [...params].map(([field, declared]) => ({
      field,
      label: `${subject}.${field}`,
      param: declared,
      target,
      assign: (value) => {
        if (!Reflect.set(target, field, value)) {
          throw new UsageError(`cannot assign ${subject}.${field}; is it read-only?`)
        }
      },
    }))

    const origins = new Resolver(slots, { subject, configs, logger }).run()
    return new LoadReport(target, configs, origins)
  }

  private configsFor(target: object): Config[] {
    if (this.options.configs !== undefined) {
      return flattenConfigs(this.options.configs)
    }

    const provider = findProvider(target)
    return provider === undefined ? [] : flattenConfigs(provider(target))
  }
}

/**
 * Loads `target`'s declared parameters and returns `target`.
 */
export function load<T extends object>(target: T, options?: LoaderOptions): T {
  new Loader(options).load(target)
  return target
}
