import type { Origin } from "../ports/getter"
import type { PickedOrigin } from "../ports/pick"
import { formatKeyPath } from "./key-path"

export function describeOrigin(origin: Origin): string {
  switch (origin.type) {
    case "config":
      return `${origin.config.name} ${formatKeyPath(origin.path)}`
    case "config-attr":
      return `${origin.config.name} #${origin.property}`
    default:
      return origin.type
  }
}

function isOrigin(value: PickedOrigin): value is Origin {
  return value !== undefined && "type" in value && typeof value.type === "string"
}

function isOriginList(value: PickedOrigin): value is readonly Origin[] {
  return Array.isArray(value)
}

function* eachOrigin(picked: PickedOrigin): Generator<Origin> {
  if (picked === undefined) return
  if (isOrigin(picked)) {
    yield picked
  } else if (isOriginList(picked)) {
    yield* picked
  } else {
    yield* Object.values(picked)
  }
}

/**
 * "json:app.json greeting", or a comma-separated list for picks of several
 * values ("port: env PORT, host: default" for merged mappings).
 */
export function describePicked(picked: PickedOrigin): string {
  if (picked === undefined) return "unknown"
  if (isOrigin(picked)) return describeOrigin(picked)
  if (isOriginList(picked)) {
    return picked.length === 0 ? "nothing" : picked.map(describeOrigin).join(", ")
  }

  const entries = Object.entries(picked)
  return entries.length === 0 ? "nothing" : entries.map(([key, origin]) => `${key}: ${describeOrigin(origin)}`).join(", ")
}

/** Config names (or origin types) behind a picked value, first seen first. */
export function pickedSources(picked: PickedOrigin): string[] {
  const sources = [...eachOrigin(picked)].map((origin) =>
    origin.type === "config" || origin.type === "config-attr" ? origin.config.name : origin.type,
  )

  return [...new Set(sources)]
}
