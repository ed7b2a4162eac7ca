export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (paths, flag names, service names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if running the same operation again might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) or programmer error (`false`).
   *
   * @remarks
   * A malformed config file or an unreachable backend is operational.
   * A broken invariant inside the resolver is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used for log records.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
