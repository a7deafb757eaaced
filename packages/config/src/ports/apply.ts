import type { Origin } from "./getter"

export type ApplyContext = Readonly<{
  target: object
  field: string
  label: string
  origin: Origin
}>

/**
 * Transforms or validates one found value before the pick function sees it.
 * Throwing marks the value as malformed; it is never treated as absent.
 */
export type ApplyFn<I = unknown, O = unknown> = (value: I, ctx: ApplyContext) => O
