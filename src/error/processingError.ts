import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an interceptor failed while evaluating a response or a transport failure.
 */
export class ProcessingError extends Error {
  /** ProcessingError error-name */
  override name = 'ProcessingError';
  /** Failure kind discriminant */
  readonly kind = 'processing';
}

/**
 * Type guard for {@link ProcessingError}.
 */
export function isProcessingError(error: unknown): error is ProcessingError {
  return isErrorType(ProcessingError, error);
}

/**
 * Extract a {@link ProcessingError} from an unknown error value, following nested causes.
 */
export function getProcessingError(error: unknown): null | ProcessingError {
  return unwrapErrorType(ProcessingError, error);
}
