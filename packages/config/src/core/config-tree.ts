import type { Config, ConfigTree } from "../ports/config"
import { UsageError } from "./errors"

export function isConfig(value: unknown): value is Config {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    "name" in value &&
    typeof value.name === "string" &&
    "exists" in value &&
    typeof value.exists === "function" &&
    "get" in value &&
    typeof value.get === "function" &&
    "matches" in value &&
    typeof value.matches === "function"
  )
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  )
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value === "string") return `the string ${JSON.stringify(value)}`
  return typeof value === "object" ? "a non-iterable object" : typeof value
}

/**
 * Flattens whatever a provider returned into configs, in encounter order.
 * Duplicates are kept.
 */
export function flattenConfigs(tree: ConfigTree): Config[] {
  const configs: Config[] = []

  const visit = (node: unknown): void => {
    if (isConfig(node)) {
      configs.push(node)
    } else if (isIterable(node)) {
      for (const child of node) visit(child)
    } else {
      throw new UsageError(`config provider yielded ${describeValue(node)}, which is not a Config`, {
        hints: ["providers return a Config, or an array or generator of them"],
      })
    }
  }

  visit(tree)
  return configs
}
