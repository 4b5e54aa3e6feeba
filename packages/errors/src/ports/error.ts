export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error: the file and line that failed to parse,
 * the setting name that was rejected, and so on.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code callers can branch on (`bad_local_file`, `invalid_default`, ...). */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for failures caused by the environment the program runs in (a malformed
   * `.env` line, an unreadable file); `false` for programming mistakes such as
   * registering a default that does not match its declared kind.
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
 * JSON-safe error shape, used when an error is handed to a logger.
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
