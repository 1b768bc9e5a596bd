import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a call is canceled (e.g., via AbortController or client disposal).
 */
export class CanceledError extends Error {
  /** CanceledError error-name */
  override name = 'CanceledError';
  /** Failure kind discriminant */
  readonly kind = 'canceled';
}

/**
 * Type guard for {@link CanceledError}.
 */
export function isCanceledError(error: unknown): error is CanceledError {
  return isErrorType(CanceledError, error);
}

/**
 * Extract a {@link CanceledError} from an unknown error value, following nested causes.
 */
export function getCanceledError(error: unknown): null | CanceledError {
  return unwrapErrorType(CanceledError, error);
}
