/**
 * Error entrypoint: exports the failure taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error raised when a call is canceled. */
/** Extract a {@link CanceledError} from an unknown error value, following nested causes. */
/** Type guard for {@link CanceledError}. */
export { CanceledError, getCanceledError, isCanceledError } from './canceledError.js';
/** Error representing a 4xx response. */
export { ClientError, getClientError, isClientError } from './clientError.js';
/** Error raised when a response body could not be decoded. */
export { type DecodingErrorOptions, DecodingError, getDecodingError, isDecodingError } from './decodingError.js';
/** Error raised when a request payload could not be encoded. */
export { EncodingError, getEncodingError, isEncodingError } from './encodingError.js';
/** Closed failure union and its type guard. */
export { type HttpFailure, type HttpFailureKind, isHttpFailure } from './failure.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when the retry budget is spent. */
export {
  getMaxRetryCountReachedError,
  isMaxRetryCountReachedError,
  MaxRetryCountReachedError,
} from './maxRetryCountReachedError.js';
/** Error raised when an interceptor fails to prepare a request. */
export { getPreparationError, isPreparationError, PreparationError } from './preparationError.js';
/** Error raised when an interceptor fails to evaluate an outcome. */
export { getProcessingError, isProcessingError, ProcessingError } from './processingError.js';
/** Base of the status classifications carrying a response. */
export { getResponseError, isResponseError, ResponseError, type ResponseErrorOptions } from './responseError.js';
/** Error representing a 5xx response. */
export { getServerError, isServerError, ServerError } from './serverError.js';
/** Error thrown by the transport when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when the transport fails. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error raised by a parser for a status it does not expect. */
export {
  getUnexpectedResponseError,
  isUnexpectedResponseError,
  UnexpectedResponseError,
} from './unexpectedResponseError.js';
/** Error representing a status outside every known class. */
export { getUnexpectedStatusError, isUnexpectedStatusError, UnexpectedStatusError } from './unexpectedStatusError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
