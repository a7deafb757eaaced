import type { Config } from "./config"
import type { Origin } from "./getter"

/**
 * Origin of a picked value: one origin for a single value, a list for a list
 * of values, a record for a merged mapping.
 */
export type PickedOrigin =
  | Origin
  | readonly Origin[]
  | Readonly<Record<string, Origin>>
  | undefined

/**
 * The lazy sequence of found-and-applied values handed to a pick function.
 *
 * Values are produced on demand: a pick that stops after the first value
 * never causes later configs to be read.
 */
export interface ValuesIter<T = unknown> extends Iterable<T> {
  /** Label of the parameter being resolved. */
  readonly param: string

  /** Iterates values together with their origins. */
  withOrigin(): Iterable<readonly [T, Origin]>

  /** Set by the pick function to describe what it picked. */
  origin: PickedOrigin
}

/**
 * Reduces the candidate values of one parameter to its final value.
 * Throws NoValueFoundError when it cannot produce one.
 */
export type PickFn<R = unknown> = (values: ValuesIter) => R

export type OnLoadContext = Readonly<{
  target: object
  field: string
  label: string
  origin: PickedOrigin
  configs: readonly Config[]
}>

/**
 * Runs once a parameter's value has been picked, before it is assigned.
 */
export type OnLoadFn = (value: unknown, ctx: OnLoadContext) => void
