/**
 * Fields the cache layer attaches to its log entries.
 *
 * Bound once through `child()` (service, module, namespace) or passed per
 * call (batch counters, timings, errors).
 */
export type LogContext = {
  service: string
  module: string
  env: string

  namespace: string
  store: string
  operation: string

  requested: number
  distinct: number
  hits: number
  misses: number
  removed: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/** Fields accepted by `child()`: known context keys plus free-form bindings. */
export type LogBindings = Partial<LogContext> & Record<string, unknown>
