import type { HttpResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options for {@link DecodingError} */
export interface DecodingErrorOptions extends ErrorOptions {
  /** Response whose body failed to decode */
  response?: HttpResponse;
}

/**
 * Error raised when a response body could not be turned into the expected value,
 * including responses whose status the parser did not expect.
 */
export class DecodingError extends Error {
  /** DecodingError error-name */
  override name = 'DecodingError';
  /** Failure kind discriminant */
  readonly kind = 'decoding';
  /** Response being decoded, when one was received */
  #response: HttpResponse | null;

  /** Creates a new instance of a DecodingError, optionally holding the response being decoded */
  constructor(message: string, { response, ...opts }: DecodingErrorOptions = {}) {
    super(message, opts);
    this.#response = response ?? null;
  }

  /** Response being decoded, when one was received */
  get response(): HttpResponse | null {
    return this.#response;
  }
}

/**
 * Type guard for {@link DecodingError}.
 */
export function isDecodingError(error: unknown): error is DecodingError {
  return isErrorType(DecodingError, error);
}

/**
 * Extract a {@link DecodingError} from an unknown error value, following nested causes.
 */
export function getDecodingError(error: unknown): null | DecodingError {
  return unwrapErrorType(DecodingError, error);
}
