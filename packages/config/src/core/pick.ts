import type { Origin } from "../ports/getter"
import type { PickFn, ValuesIter } from "../ports/pick"
import { NoValueFoundError, PickError } from "./errors"

function isPlainMapping(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false
  const proto: unknown = Object.getPrototypeOf(v)
  return proto === Object.prototype || proto === null
}

/**
 * The first value. Later getters are never consulted.
 */
export function first<T>(values: ValuesIter<T>): T {
  for (const [value, origin] of values.withOrigin()) {
    values.origin = origin
    return value
  }

  throw new NoValueFoundError(values.param)
}

/**
 * Every value, in getter order. Never fails; may be empty.
 */
export function all<T>(values: ValuesIter<T>): T[] {
  const picked: T[] = []
  const origins: Origin[] = []

  for (const [value, origin] of values.withOrigin()) {
    picked.push(value)
    origins.push(origin)
  }

  values.origin = origins
  return picked
}

// Plain assignment would turn a "__proto__" key into the prototype.
function defineEntry<V>(record: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true })
}

/**
 * Shallow merge of mapping values; for each key the earliest value wins.
 */
export function mergeMappings(values: ValuesIter): Record<string, unknown> {
  const merged: Record<string, unknown> = {}
  const origins: Record<string, Origin> = {}

  for (const [value, origin] of values.withOrigin()) {
    if (!isPlainMapping(value)) {
      throw new PickError(values.param, `expected a mapping, got ${Array.isArray(value) ? "an array" : typeof value}`, {
        context: { origin: origin.type },
      })
    }

    for (const [key, entry] of Object.entries(value)) {
      if (Object.hasOwn(merged, key)) continue
      defineEntry(merged, key, entry)
      defineEntry(origins, key, origin)
    }
  }

  values.origin = origins
  return merged
}

export type PickPolicy = "first" | "all" | "merge-mappings"

export const pickPolicies: Readonly<Record<PickPolicy, PickFn>> = {
  first,
  all,
  "merge-mappings": mergeMappings,
}
