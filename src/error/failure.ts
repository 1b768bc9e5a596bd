import { CanceledError } from './canceledError.js';
import { ClientError } from './clientError.js';
import { DecodingError } from './decodingError.js';
import { EncodingError } from './encodingError.js';
import { MaxRetryCountReachedError } from './maxRetryCountReachedError.js';
import { PreparationError } from './preparationError.js';
import { ProcessingError } from './processingError.js';
import { ServerError } from './serverError.js';
import { TransportError } from './transportError.js';
import { UnexpectedStatusError } from './unexpectedStatusError.js';

/**
 * Closed set of failures a call can end with. Narrow on `kind`.
 */
export type HttpFailure =
  | EncodingError
  | DecodingError
  | PreparationError
  | ProcessingError
  | TransportError
  | ClientError
  | ServerError
  | UnexpectedStatusError
  | MaxRetryCountReachedError
  | CanceledError;

/** Discriminant values of {@link HttpFailure}. */
export type HttpFailureKind = HttpFailure['kind'];

/**
 * Type guard for {@link HttpFailure}. Only the error itself is checked, not its causes.
 */
export function isHttpFailure(error: unknown): error is HttpFailure {
  return (
    error instanceof EncodingError ||
    error instanceof DecodingError ||
    error instanceof PreparationError ||
    error instanceof ProcessingError ||
    error instanceof TransportError ||
    error instanceof ClientError ||
    error instanceof ServerError ||
    error instanceof UnexpectedStatusError ||
    error instanceof MaxRetryCountReachedError ||
    error instanceof CanceledError
  );
}
