import type { KeyPath, KeyPathInput, KeySegment } from "../ports/config"
import { UsageError } from "./errors"

type Lookup = { found: true; value: unknown } | { found: false }

const NOT_FOUND: Lookup = { found: false }
const BARE_SEGMENT = /^[^.[\]"']+$/
const INDEX = /^\d+$/

function malformed(input: string, reason: string): UsageError {
  return new UsageError(`malformed key path ${JSON.stringify(input)}: ${reason}`, {
    context: { keyPath: input },
  })
}

function readBracket(input: string, start: number): [KeySegment, number] {
  const quote = input[start + 1]

  if (quote === '"' || quote === "'") {
    let value = ""
    let i = start + 2
    while (i < input.length && input[i] !== quote) {
      const ch = input[i]
      if (ch === "\\" && i + 1 < input.length) {
        value += input[i + 1]
        i += 2
      } else {
        value += ch
        i += 1
      }
    }
    if (i >= input.length) throw malformed(input, "unterminated quote")
    if (input[i + 1] !== "]") throw malformed(input, `expected "]" at ${i + 1}`)
    return [value, i + 2]
  }

  const close = input.indexOf("]", start)
  if (close === -1) throw malformed(input, "unterminated bracket")
  const inner = input.slice(start + 1, close)
  if (!INDEX.test(inner)) throw malformed(input, `bracket must hold an index or a quoted key, got ${JSON.stringify(inner)}`)
  return [Number(inner), close + 1]
}

/**
 * Parse `a.b[0]["x.y"]` into `["a", "b", 0, "x.y"]`. Arrays pass through.
 */
export function parseKeyPath(input: KeyPathInput): KeyPath {
  if (typeof input !== "string") return input
  if (input === "") throw malformed(input, "empty")

  const segments: KeySegment[] = []
  let i = 0
  let afterDot = false

  while (i < input.length) {
    const ch = input[i]

    if (ch === "[") {
      if (afterDot) throw malformed(input, `unexpected "[" at ${i}`)
      const [segment, next] = readBracket(input, i)
      segments.push(segment)
      i = next
    } else if (ch === ".") {
      if (segments.length === 0 || afterDot) throw malformed(input, `unexpected "." at ${i}`)
      afterDot = true
      i += 1
      continue
    } else {
      if (segments.length > 0 && !afterDot) throw malformed(input, `expected "." or "[" at ${i}`)
      let end = i
      while (end < input.length && input[end] !== "." && input[end] !== "[") end += 1
      const token = input.slice(i, end)
      if (token.includes("]")) throw malformed(input, `unexpected "]" at ${i + token.indexOf("]")}`)
      segments.push(token)
      i = end
    }

    afterDot = false
  }

  if (afterDot) throw malformed(input, "trailing dot")
  return segments
}

export function formatKeyPath(path: KeyPath): string {
  return path
    .map((segment, index) => {
      if (typeof segment === "number") return `[${segment}]`
      if (BARE_SEGMENT.test(segment)) return index === 0 ? segment : `.${segment}`
      return `[${JSON.stringify(segment)}]`
    })
    .join("")
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function toIndex(segment: KeySegment): number | undefined {
  if (typeof segment === "number") return Number.isInteger(segment) && segment >= 0 ? segment : undefined
  return INDEX.test(segment) ? Number(segment) : undefined
}

/**
 * Walk `data` along `path`. Missing keys, out-of-range indices, and stepping
 * into a scalar all end as not found; a value of `undefined` is not found.
 */
export function lookup(data: unknown, path: KeyPath): Lookup {
  let current = data

  for (const segment of path) {
    if (Array.isArray(current)) {
      const index = toIndex(segment)
      if (index === undefined || index >= current.length) return NOT_FOUND
      current = current[index]
    } else if (current instanceof Map) {
      if (!current.has(segment)) return NOT_FOUND
      current = current.get(segment)
    } else if (isRecord(current)) {
      const key = String(segment)
      if (!Object.hasOwn(current, key)) return NOT_FOUND
      current = current[key]
    } else {
      return NOT_FOUND
    }
  }

  return current === undefined ? NOT_FOUND : { found: true, value: current }
}
