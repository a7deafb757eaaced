import { errorChain } from "./error-chain"
import { isAppError } from "./is-app-error"

function describeValue(value: unknown): string {
  if (typeof value === "string") return value

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

function headline(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`
  return `NonErrorThrown: ${describeValue(err)}`
}

/**
 * Render an error and its causes as indented, human-readable lines.
 *
 * @example
 * ```text
 * ApplyError: cannot apply value for Server.port
 *   config: env
 *   keyPath: PORT
 *   hint: check the value of PORT
 * caused by Error: expected an integer, got "eighty"
 * ```
 */
export function formatError(err: unknown): string {
  const lines: string[] = []

  errorChain(err).forEach((link, i) => {
    lines.push(i === 0 ? headline(link) : `caused by ${headline(link)}`)

    if (!isAppError(link)) return

    for (const [key, value] of Object.entries(link.context)) {
      if (value !== undefined) lines.push(`  ${key}: ${describeValue(value)}`)
    }
    for (const hint of link.hints) {
      lines.push(`  hint: ${hint}`)
    }
  })

  return lines.join("\n")
}
