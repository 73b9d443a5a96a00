export { BaseError, type BaseErrorOptions, serializeError, type SerializeOptions } from "./core/base-error"
export { combineErrors, MultiError } from "./core/multi-error"
export { errorChain, findInChain } from "./core/utils/error-chain"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
