export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 */
export const LogLevels = {
  /** Every candidate value looked at while resolving. */
  Trace: 10,
  /** Objects loaded and the source each parameter resolved from. */
  Debug: 20,
  Info: 30,
  /** Parameters that could not be resolved. */
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
