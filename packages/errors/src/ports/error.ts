export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (keys, namespaces, sizes).
 * Carried alongside the message instead of being interpolated into it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed (e.g. a store outage). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (store unreachable, bad input),
   * `false` for broken invariants such as corrupted cache entries.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape used when errors are logged or reported.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
