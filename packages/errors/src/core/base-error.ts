import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * `BaseError` keeps its code and context, plain `Error`s get the code
 * `"unknown"`, and anything else is wrapped as `NonErrorThrown`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: readNodeCode(err) ?? "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

// Node attaches codes such as MODULE_NOT_FOUND to system and loader errors.
function readNodeCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code")

  return typeof code === "string" ? code.toLowerCase() : undefined
}
