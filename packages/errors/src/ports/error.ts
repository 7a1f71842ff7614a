export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (driver ids, config keys, paths).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (missing driver, bad config file),
   * `false` for programmer errors such as a malformed registry.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log payloads and the CLI's JSON output.
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
