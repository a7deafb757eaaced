import type { Origin } from "../ports/getter"
import type { PickedOrigin, ValuesIter } from "../ports/pick"

/**
 * A restartable, lazy sequence of candidate values. Each iteration pulls
 * from a fresh generator, so nothing is read until a pick asks for it.
 */
export class CandidateValues<T = unknown> implements ValuesIter<T> {
  origin: PickedOrigin = undefined

  constructor(
    readonly param: string,
    private readonly source: () => Iterable<readonly [T, Origin]>,
  ) {}

  *[Symbol.iterator](): Iterator<T> {
    for (const [value] of this.source()) {
      yield value
    }
  }

  withOrigin(): Iterable<readonly [T, Origin]> {
    return this.source()
  }
}
