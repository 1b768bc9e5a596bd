import type { HttpResponse } from '../types/request.js';
import type { Status } from '../types/status.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised by a parser when the response status is not one it expects.
 * Reaches callers as the `cause` of a {@link DecodingError}.
 */
export class UnexpectedResponseError extends Error {
  /** UnexpectedResponseError error-name */
  override name = 'UnexpectedResponseError';
  #response: HttpResponse;
  #expected: Status;

  /** Creates a new instance for a response outside the `expected` statuses */
  constructor(
    response: HttpResponse,
    expected: Status,
    message = `error unexpected response status ${response.status}, expected ${expected.description}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.#response = response;
    this.#expected = expected;
  }

  /** Response that failed the expectation */
  get response(): HttpResponse {
    return this.#response;
  }

  /** Statuses the parser accepts */
  get expected(): Status {
    return this.#expected;
  }
}

/**
 * Type guard for {@link UnexpectedResponseError}.
 */
export function isUnexpectedResponseError(error: unknown): error is UnexpectedResponseError {
  return isErrorType(UnexpectedResponseError, error);
}

/**
 * Extract an {@link UnexpectedResponseError} from an unknown error value, following nested causes.
 */
export function getUnexpectedResponseError(error: unknown): null | UnexpectedResponseError {
  return unwrapErrorType(UnexpectedResponseError, error);
}
