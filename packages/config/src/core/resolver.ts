import { formatError } from "@knobs/errors"
import type { Logger } from "@knobs/logger"
import type { Config } from "../ports/config"
import type { ResolveContext } from "../ports/getter"
import type { PickedOrigin } from "../ports/pick"
import { CircularDependencyError, NoValueFoundError, ResolutionError, UsageError } from "./errors"
import type { UnresolvedParam } from "./errors"
import { describePicked } from "./origin"
import type { Param } from "./param"

/**
 * One place a parameter's value goes: an object field or a position in a
 * collection.
 */
export type Slot = Readonly<{
  field: string
  label: string
  param: Param
  target: object
  assign(value: unknown): void
}>

export type ResolverOptions = Readonly<{
  /** What is being loaded, for messages: a class name or "collection". */
  subject: string
  configs: readonly Config[]
  logger: Logger
}>

type Outcome =
  | Readonly<{ ok: true; value: unknown; origin: PickedOrigin }>
  | Readonly<{ ok: false; error: NoValueFoundError }>

/**
 * Resolves a set of slots against one list of configs.
 *
 * Every slot is resolved before any is assigned, so a failed load leaves
 * its target untouched. Slots may depend on each other through
 * `ctx.resolve`; each is resolved at most once.
 */
export class Resolver {
  private readonly slots: ReadonlyMap<string, Slot>
  private readonly outcomes = new Map<string, Outcome>()
  private readonly resolving: string[] = []

  constructor(
    slots: readonly Slot[],
    private readonly options: ResolverOptions,
  ) {
    const byField = new Map<string, Slot>()

    for (const slot of slots) {
      const existing = byField.get(slot.field)
      if (existing !== undefined) {
        throw new UsageError(`${existing.label} and ${slot.label} both resolve as "${slot.field}"`, {
          context: { subject: options.subject, field: slot.field },
        })
      }
      byField.set(slot.field, slot)
    }

    this.slots = byField
  }

  /**
   * @returns the origin of each assigned value, by field
   * @throws ResolutionError naming every slot without a value
   */
  run(): Map<string, PickedOrigin> {
    for (const field of this.slots.keys()) {
      try {
        this.resolve(field)
      } catch (err) {
        if (!(err instanceof NoValueFoundError)) throw err
      }
    }

    const unresolved: UnresolvedParam[] = []
    for (const [field, slot] of this.slots) {
      const outcome = this.outcomes.get(field)
      if (outcome !== undefined && !outcome.ok) {
        unresolved.push({ error: outcome.error, tried: slot.param.tried() })
      }
    }

    if (unresolved.length > 0) {
      const { subject, configs, logger } = this.options
      const error = new ResolutionError(subject, unresolved, {
        hints:
          configs.length === 0
            ? ["no configs were provided; register a provider with defineConfigs() or pass `configs`"]
            : [],
      })
      logger.warn("unresolved parameters", { params: error.params, detail: formatError(error) })
      throw error
    }

    const origins = new Map<string, PickedOrigin>()
    for (const [field, slot] of this.slots) {
      const outcome = this.outcomes.get(field)
      if (outcome?.ok) {
        slot.assign(outcome.value)
        origins.set(field, outcome.origin)
      }
    }

    return origins
  }

  private resolve(field: string): unknown {
    const done = this.outcomes.get(field)
    if (done !== undefined) {
      if (done.ok) return done.value
      throw done.error
    }

    const slot = this.slots.get(field)
    if (slot === undefined) {
      throw new UsageError(`${this.options.subject} has no parameter ${JSON.stringify(field)}`, {
        context: { field, known: [...this.slots.keys()] },
      })
    }

    const cycleStart = this.resolving.indexOf(field)
    if (cycleStart !== -1) {
      throw new CircularDependencyError([...this.resolving.slice(cycleStart), field].map((f) => this.labelOf(f)))
    }

    this.resolving.push(field)
    try {
      const { value, origin } = slot.param.resolve(this.contextFor(slot))
      slot.param.onLoad?.(value, {
        target: slot.target,
        field,
        label: slot.label,
        origin,
        configs: this.options.configs,
      })

      this.options.logger.debug("resolved parameter", { param: slot.label, source: describePicked(origin) })
      this.outcomes.set(field, { ok: true, value, origin })
      return value
    } catch (err) {
      if (!(err instanceof NoValueFoundError)) throw err

      const error =
        err.param === slot.label
          ? err
          : new NoValueFoundError(slot.label, { reason: `depends on ${err.param}`, cause: err })
      this.outcomes.set(field, { ok: false, error })
      throw error
    } finally {
      this.resolving.pop()
    }
  }

  private contextFor(slot: Slot): ResolveContext {
    return {
      target: slot.target,
      field: slot.field,
      label: slot.label,
      configs: this.options.configs,
      logger: this.options.logger,
      resolve: (field) => this.resolve(field),
    }
  }

  private labelOf(field: string): string {
    return this.slots.get(field)?.label ?? field
  }
}
