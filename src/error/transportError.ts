import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the transport could not complete the exchange.
 * The original failure is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  override name = 'TransportError';
  /** Failure kind discriminant */
  readonly kind = 'transport';
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
