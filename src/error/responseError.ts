import type { ResponseParser } from '../codec/parser.js';
import { type CodecRegistry, defaultCodecs } from '../codec/registry.js';
import type { HttpResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options for {@link ResponseError} and its subclasses */
export interface ResponseErrorOptions extends ErrorOptions {
  /**
   * Codecs of the call that received the response; the default for {@link ResponseError.parse}.
   * @default defaultCodecs
   */
  codecs?: CodecRegistry;
}

/**
 * Base of the status classifications that carry the full response
 * ({@link ClientError}, {@link ServerError}, {@link UnexpectedStatusError}).
 */
export abstract class ResponseError extends Error {
  /** Failure kind discriminant */
  abstract readonly kind: 'clientError' | 'serverError' | 'unexpectedStatus';
  /** Response causing the error */
  #response: HttpResponse;
  /** Codecs used by the failing call */
  #codecs: CodecRegistry;

  /** Creates a new instance wrapping the classified response */
  constructor(
    response: HttpResponse,
    message = `error response with status ${response.status}`,
    { codecs = defaultCodecs, ...opts }: ResponseErrorOptions = {},
  ) {
    super(message, opts);
    this.#response = response;
    this.#codecs = codecs;
  }

  /** Response causing the error */
  get response(): HttpResponse {
    return this.#response;
  }

  /** Status code of the response */
  get status(): number {
    return this.#response.status;
  }

  /** Codecs used by the failing call */
  get codecs(): CodecRegistry {
    return this.#codecs;
  }

  /**
   * Decodes the error body with `parser`, ignoring the statuses the parser expects.
   * Uses the failing call's codecs unless others are given.
   * Can be called repeatedly with different parsers.
   * @example
   * const [err, body] = await clientError.parse(jsonParser({ schema: problemSchema }));
   */
  async parse<T>(parser: ResponseParser<T>, codecs: CodecRegistry = this.#codecs): SafeWrapAsync<Error, T> {
    const [err, result] = await safeWrapAsync(() => parser.decode(this.#response, codecs));
    if (err) {
      return [err, null];
    }

    return result;
  }
}

/**
 * Type guard for {@link ResponseError}.
 */
export function isResponseError(error: unknown): error is ResponseError {
  return isErrorType(ResponseError, error);
}

/**
 * Extract a {@link ResponseError} from an unknown error value, following nested causes.
 */
export function getResponseError(error: unknown): null | ResponseError {
  return unwrapErrorType(ResponseError, error);
}
