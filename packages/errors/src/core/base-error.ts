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
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

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
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - BaseError instances keep code, context and operational flag
 * - Standard Error instances get code "unknown"
 * - AggregateError-like values (anything with an `errors` array) keep their members
 * - Non-Error thrown values are wrapped with the value in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const base = err instanceof BaseError
    const cause: unknown = err.cause
    const members = aggregateMembers(err)

    return {
      name: err.name,
      code: base ? err.code : "unknown",
      message: err.message,
      context: base ? { ...err.context } : {},
      isOperational: base ? err.isOperational : false,
      timestamp: base ? err.timestamp.toISOString() : new Date().toISOString(),
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(members && { errors: members.map((e) => serializeError(e, options)) }),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

function aggregateMembers(err: Error): readonly unknown[] | undefined {
  if (!("errors" in err)) return undefined

  const { errors } = err

  return Array.isArray(errors) ? errors : undefined
}
