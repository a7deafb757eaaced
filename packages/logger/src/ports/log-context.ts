/**
 * Fields a resolution log entry can be scoped to.
 */
export type LogContext = {
  /** Class name of the object being loaded, e.g. "Greeter". */
  target: string
  /** Parameter label, e.g. "Greeter.name". */
  param: string
  /** Config name, e.g. "json:app.json". */
  config: string
  /** Key path inside the config, e.g. "server.port". */
  keyPath: string

  service: string
  module: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
