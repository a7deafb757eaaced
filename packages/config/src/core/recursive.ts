import type { Logger } from "@knobs/logger"
import { createNullLogger } from "@knobs/logger"
import type { Config, ConfigTree, KeySegment } from "../ports/config"
import { flattenConfigs } from "./config-tree"
import { UsageError } from "./errors"
import { formatKeyPath } from "./key-path"
import { Loader } from "./loader"
import type { LoaderOptions } from "./loader"
import { Param } from "./param"
import { findProvider, hasDeclaredParams } from "./registry"
import { Resolver } from "./resolver"
import type { Slot } from "./resolver"

type SharedOptions = Omit<LoaderOptions, "configs">

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Walks an object graph, loading every object with declared parameters.
 * Each object is entered once, so cycles terminate.
 */
class Traversal {
  private readonly visited = new WeakSet<object>()

  constructor(private readonly options: SharedOptions) {}

  /**
   * Loads `target` with `configs` (or its own provider when undefined), then
   * descends into its fields.
   */
  loadObject(target: object, configs: ConfigTree | undefined): void {
    this.visited.add(target)

    const report = new Loader(configs === undefined ? this.options : { ...this.options, configs }).load(target)

    for (const child of Object.values(target)) {
      this.descend(child, report.configs)
    }
  }

  /**
   * Objects with their own provider use it; others inherit `configs`.
   */
  descend(value: unknown, configs: readonly Config[]): void {
    if (typeof value !== "object" || value === null || this.visited.has(value)) return

    if (hasDeclaredParams(value)) {
      this.loadObject(value, findProvider(value) === undefined ? configs : undefined)
      return
    }

    this.visited.add(value)

    if (Array.isArray(value)) {
      for (const item of value) this.descend(item, configs)
    } else if (value instanceof Map) {
      for (const item of value.values()) this.descend(item, configs)
    } else if (isPlainObject(value)) {
      for (const item of Object.values(value)) this.descend(item, configs)
    }
  }
}

function split(options: LoaderOptions): [readonly Config[], SharedOptions] {
  const { configs, ...shared } = options
  return [configs === undefined ? [] : flattenConfigs(configs), shared]
}

/**
 * Loads `target`, then every reachable object with declared parameters:
 * through fields, arrays, plain objects and Map values.
 */
export function recursiveLoad<T extends object>(target: T, options: LoaderOptions = {}): T {
  const { configs, ...shared } = options
  new Traversal(shared).loadObject(target, configs)
  return target
}

/**
 * recursiveLoad for each item. Items without a provider use `options.configs`.
 */
export function recursiveLoadFromList<L extends Iterable<unknown>>(items: L, options: LoaderOptions = {}): L {
  const [configs, shared] = split(options)
  const traversal = new Traversal(shared)

  for (const item of items) traversal.descend(item, configs)
  return items
}

export function recursiveLoadFromDictValues<D extends Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>>(
  mapping: D,
  options: LoaderOptions = {},
): D {
  const [configs, shared] = split(options)
  const traversal = new Traversal(shared)
  const values = mapping instanceof Map ? [...mapping.values()] : Object.values(mapping)

  for (const item of values) traversal.descend(item, configs)
  return mapping
}

type Collection = unknown[] | Map<unknown, unknown> | Record<string, unknown>

function isCollection(value: unknown): value is Collection {
  return Array.isArray(value) || value instanceof Map || isPlainObject(value)
}

function labelFor(path: readonly KeySegment[]): string {
  const rendered = formatKeyPath(path)
  return rendered.startsWith("[") ? `collection${rendered}` : `collection.${rendered}`
}

/**
 * Replaces every Param stored in `collection` (arrays, plain objects and
 * Maps, nested) with its resolved value. Slots are addressed by key path,
 * e.g. `ctx.resolve("db.port")`.
 */
export function loadCollection<C extends object>(
  collection: C,
  configs: ConfigTree,
  options: SharedOptions = {},
): C {
  if (!isCollection(collection)) {
    throw new UsageError("loadCollection expects an array, a plain object or a Map")
  }

  const slots: Slot[] = []
  const seen = new WeakSet<object>()

  const visit = (item: unknown, path: KeySegment[], container: object, assign: (value: unknown) => void): void => {
    if (item instanceof Param) {
      slots.push({ field: formatKeyPath(path), label: labelFor(path), param: item, target: container, assign })
    } else if (isCollection(item)) {
      collect(item, path)
    }
  }

  const collect = (container: Collection, path: KeySegment[]): void => {
    if (seen.has(container)) return
    seen.add(container)

    if (Array.isArray(container)) {
      const list: unknown[] = container
      list.forEach((item, index) => {
        visit(item, [...path, index], list, (value) => {
          list[index] = value
        })
      })
    } else if (container instanceof Map) {
      const map: Map<unknown, unknown> = container
      for (const [key, item] of map) {
        const segment: KeySegment = typeof key === "number" ? key : String(key)
        visit(item, [...path, segment], map, (value) => {
          map.set(key, value)
        })
      }
    } else {
      const record: Record<string, unknown> = container
      for (const [key, item] of Object.entries(record)) {
        visit(item, [...path, key], record, (value) => {
          record[key] = value
        })
      }
    }
  }

  collect(collection, [])

  const logger: Logger = (options.logger ?? createNullLogger()).child({ target: "collection" })
  const flat = flattenConfigs(configs)
  logger.debug("loading collection", { params: slots.map((slot) => slot.field), configs: flat.map((c) => c.name) })

  new Resolver(slots, { subject: "collection", configs: flat, logger }).run()
  return collection
}
