import type { HttpResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { ResponseError, type ResponseErrorOptions } from './responseError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response classified as server error (5xx).
 */
export class ServerError extends ResponseError {
  /** ServerError error-name */
  override name = 'ServerError';
  /** Failure kind discriminant */
  readonly kind = 'serverError';

  /** Creates a new instance of a ServerError with defaulting message + response to wrap */
  constructor(
    response: HttpResponse,
    message = `error received server error status ${response.status}`,
    opts?: ResponseErrorOptions,
  ) {
    super(response, message, opts);
  }
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}

/**
 * Extract a {@link ServerError} from an unknown error value, following nested causes.
 */
export function getServerError(error: unknown): null | ServerError {
  return unwrapErrorType(ServerError, error);
}
