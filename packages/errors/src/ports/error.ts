export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors: parameter labels, config names,
 * key paths and the like.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Short, user-facing suggestions for fixing the problem.
   *
   * @example ["did you forget to call defineConfigs()?"]
   */
  readonly hints: readonly string[]

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected failure caused by the environment (true) or a
   * programmer error in the way the library is used (false).
   *
   * @remarks
   * - Operational (`true`): a missing value, a malformed file, a bad CLI flag.
   * - Non-operational (`false`): a bad declaration, a circular dependency.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  hints: string[]
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
