import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request payload could not be validated or serialized.
 * Never retried.
 */
export class EncodingError extends Error {
  /** EncodingError error-name */
  override name = 'EncodingError';
  /** Failure kind discriminant */
  readonly kind = 'encoding';
}

/**
 * Type guard for {@link EncodingError}.
 */
export function isEncodingError(error: unknown): error is EncodingError {
  return isErrorType(EncodingError, error);
}

/**
 * Extract an {@link EncodingError} from an unknown error value, following nested causes.
 */
export function getEncodingError(error: unknown): null | EncodingError {
  return unwrapErrorType(EncodingError, error);
}
