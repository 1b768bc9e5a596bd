import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an interceptor failed to prepare the outgoing request.
 */
export class PreparationError extends Error {
  /** PreparationError error-name */
  override name = 'PreparationError';
  /** Failure kind discriminant */
  readonly kind = 'preparation';
}

/**
 * Type guard for {@link PreparationError}.
 */
export function isPreparationError(error: unknown): error is PreparationError {
  return isErrorType(PreparationError, error);
}

/**
 * Extract a {@link PreparationError} from an unknown error value, following nested causes.
 */
export function getPreparationError(error: unknown): null | PreparationError {
  return unwrapErrorType(PreparationError, error);
}
