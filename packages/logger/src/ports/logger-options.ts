import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Render entries as human-readable lines instead of JSON.
   * Meant for local development.
   */
  prettify?: boolean
}
