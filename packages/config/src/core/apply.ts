import path from "node:path"
import { z } from "zod"
import type { ZodType } from "zod"
import type { ApplyContext, ApplyFn } from "../ports/apply"
import type { Config, FileConfig } from "../ports/config"

export const identity: ApplyFn = (value) => value

/**
 * Composes apply functions left to right.
 */
export function pipeline(fns: ApplyFn | readonly ApplyFn[]): ApplyFn {
  if (typeof fns === "function") return fns
  if (fns.length === 0) return identity
  if (fns.length === 1 && fns[0] !== undefined) return fns[0]

  return (value, ctx) => fns.reduce((acc, fn) => fn(acc, ctx), value)
}

/**
 * Validates (and coerces) a value with a zod type. Throws with zod's
 * formatted issues when parsing fails.
 *
 * @example schema(z.coerce.number().int().min(1))
 */
export function schema<S extends ZodType>(type: S): ApplyFn<unknown, z.output<S>> {
  return (value) => {
    const result = type.safeParse(value)

    if (!result.success) {
      throw new TypeError(z.prettifyError(result.error))
    }

    return result.data
  }
}

function isFileConfig(config: Config): config is FileConfig {
  return "file" in config && typeof config.file === "string"
}

export type RelpathOptions = {
  /**
   * Base for values that do not come from a file config.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Resolves a path value. Paths read from a file config are relative to that
 * file's directory; anything else is relative to `cwd`.
 */
export function relpath(options: RelpathOptions = {}): ApplyFn<unknown, string> {
  return (value: unknown, ctx: ApplyContext) => {
    if (typeof value !== "string") {
      throw new TypeError(`expected a path string, got ${typeof value}`)
    }

    const { origin } = ctx
    const base =
      origin.type === "config" && isFileConfig(origin.config)
        ? path.dirname(origin.config.file)
        : (options.cwd ?? process.cwd())

    return path.resolve(base, value)
  }
}
