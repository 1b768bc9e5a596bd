import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised by the transport when a request exceeds the configured timeout.
 * Reaches callers as the `cause` of a {@link TransportError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  override name = 'TimeoutError';
  /** Milliseconds the request was allowed to take */
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the given timeout */
  constructor(timeout: number, message = `error request timed out after ${timeout}ms`, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Milliseconds the request was allowed to take */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
