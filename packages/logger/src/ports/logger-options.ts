import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Minimum level to emit; "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Keep it off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
