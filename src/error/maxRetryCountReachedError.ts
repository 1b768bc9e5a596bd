import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when interceptors keep asking for retries after the retry budget is spent.
 */
export class MaxRetryCountReachedError extends Error {
  /** MaxRetryCountReachedError error-name */
  override name = 'MaxRetryCountReachedError';
  /** Failure kind discriminant */
  readonly kind = 'maxRetryCountReached';
  /** Internal attempts made before the budget ran out */
  #attempts: number;

  /** Creates a new instance of a MaxRetryCountReachedError with the number of attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts made, the initial one included */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Type guard for {@link MaxRetryCountReachedError}.
 */
export function isMaxRetryCountReachedError(error: unknown): error is MaxRetryCountReachedError {
  return isErrorType(MaxRetryCountReachedError, error);
}

/**
 * Extract a {@link MaxRetryCountReachedError} from an unknown error value, following nested causes.
 */
export function getMaxRetryCountReachedError(error: unknown): null | MaxRetryCountReachedError {
  return unwrapErrorType(MaxRetryCountReachedError, error);
}
