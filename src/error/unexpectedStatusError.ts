import type { HttpResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { ResponseError, type ResponseErrorOptions } from './responseError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response classified as unexpected status (outside 200-599).
 */
export class UnexpectedStatusError extends ResponseError {
  /** UnexpectedStatusError error-name */
  override name = 'UnexpectedStatusError';
  /** Failure kind discriminant */
  readonly kind = 'unexpectedStatus';

  /** Creates a new instance of a UnexpectedStatusError with defaulting message + response to wrap */
  constructor(
    response: HttpResponse,
    message = `error received unexpected status ${response.status}`,
    opts?: ResponseErrorOptions,
  ) {
    super(response, message, opts);
  }
}

/**
 * Type guard for {@link UnexpectedStatusError}.
 */
export function isUnexpectedStatusError(error: unknown): error is UnexpectedStatusError {
  return isErrorType(UnexpectedStatusError, error);
}

/**
 * Extract a {@link UnexpectedStatusError} from an unknown error value, following nested causes.
 */
export function getUnexpectedStatusError(error: unknown): null | UnexpectedStatusError {
  return unwrapErrorType(UnexpectedStatusError, error);
}
