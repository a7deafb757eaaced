function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

export type ErrorChainOptions = Readonly<{
  /** Upper bound on the number of links returned. Default: 50 */
  maxDepth?: number
}>

/**
 * Walk the `cause` chain of an error, outermost first.
 *
 * Stops at the first repeated object, so self-referencing causes terminate.
 */
export function errorChain(err: unknown, options: ErrorChainOptions = {}): unknown[] {
  const maxDepth = options.maxDepth ?? 50
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = getCause(current)
  }

  return chain
}
