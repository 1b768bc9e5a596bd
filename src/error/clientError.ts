import type { HttpResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { ResponseError, type ResponseErrorOptions } from './responseError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response classified as client error (4xx).
 */
export class ClientError extends ResponseError {
  /** ClientError error-name */
  override name = 'ClientError';
  /** Failure kind discriminant */
  readonly kind = 'clientError';

  /** Creates a new instance of a ClientError with defaulting message + response to wrap */
  constructor(
    response: HttpResponse,
    message = `error received client error status ${response.status}`,
    opts?: ResponseErrorOptions,
  ) {
    super(response, message, opts);
  }
}

/**
 * Type guard for {@link ClientError}.
 */
export function isClientError(error: unknown): error is ClientError {
  return isErrorType(ClientError, error);
}

/**
 * Extract a {@link ClientError} from an unknown error value, following nested causes.
 */
export function getClientError(error: unknown): null | ClientError {
  return unwrapErrorType(ClientError, error);
}
