import type { StandardSchemaV1 } from '@standard-schema/spec';
import { UnexpectedResponseError } from '../error/unexpectedResponseError.js';
import { type HttpResponse, type MimeType, MimeTypes } from '../types/request.js';
import { type Status, Statuses } from '../types/status.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { CodecRegistry } from './registry.js';

/**
 * Turns a response into a value.
 *
 * `mimeType` becomes the request's `Accept` header and selects the codec; `expecting` lists
 * the statuses the parser accepts (`null` accepts any). Use {@link parseResponse} to apply both.
 */
export interface ResponseParser<T> {
  readonly mimeType: MimeType | null;
  readonly expecting: Status | null;
  /** Decodes the body, without looking at the status */
  decode(response: HttpResponse, codecs: CodecRegistry): SafeWrapAsync<Error, T>;
}

/** Options shared by the built-in parsers */
export interface ParserOptions {
  /**
   * Statuses the parser accepts, `null` for any.
   * @default Statuses.successful
   */
  expecting?: Status | null;
}

/** Options for parsers that decode with a codec */
export interface DecodedParserOptions<S extends StandardSchemaV1 = StandardSchemaV1> extends ParserOptions {
  /** Validates (and may transform) the decoded value */
  schema?: S;
}

/**
 * Checks the status against `parser.expecting`, then decodes.
 * A status mismatch yields an {@link UnexpectedResponseError}.
 */
export async function parseResponse<T>(
  parser: ResponseParser<T>,
  response: HttpResponse,
  codecs: CodecRegistry,
): SafeWrapAsync<Error, T> {
  if (parser.expecting && !parser.expecting.contains(response.status)) {
    return [new UnexpectedResponseError(response, parser.expecting), null];
  }

  const [err, result] = await safeWrapAsync(() => parser.decode(response, codecs));
  if (err) {
    return [err, null];
  }

  return result;
}

/**
 * Builds a parser from a decode function, which may throw or reject.
 * @example
 * const lines = createParser(MimeTypes.text, (response) => new TextDecoder().decode(response.body).split('\n'));
 */
export function createParser<T>(
  mimeType: MimeType | null,
  decode: (response: HttpResponse, codecs: CodecRegistry) => T | Promise<T>,
  { expecting = Statuses.successful }: ParserOptions = {},
): ResponseParser<T> {
  return {
    mimeType,
    expecting,
    decode: (response, codecs) => safeWrapAsync<T>(() => decode(response, codecs)),
  };
}

/** Returns the response untouched. */
export function passthroughParser(options?: ParserOptions): ResponseParser<HttpResponse> {
  return createParser(null, (response) => response, options);
}

/** Ignores the body. */
export function voidParser(options?: ParserOptions): ResponseParser<void> {
  return createParser<void>(null, () => undefined, options);
}

/** Decodes the body as UTF-8 text. */
export function textParser(options?: ParserOptions): ResponseParser<string> {
  return {
    mimeType: MimeTypes.text,
    expecting: options?.expecting === undefined ? Statuses.successful : options.expecting,
    async decode(response, codecs) {
      const [err, value] = codecs.decode(response.body, MimeTypes.text);
      if (err) {
        return [err, null];
      }

      if (typeof value !== 'string') {
        return [new Error(`error decoding text, codec returned ${typeof value}`), null];
      }

      return [null, value];
    },
  };
}

/**
 * Decodes the body with the codec registered for `mimeType`, then validates it against `schema`
 * when one is given.
 */
export function decodedParser<S extends StandardSchemaV1>(
  mimeType: MimeType,
  options: DecodedParserOptions<S> & { schema: S },
): ResponseParser<StandardSchemaV1.InferOutput<S>>;
export function decodedParser(mimeType: MimeType, options?: DecodedParserOptions): ResponseParser<unknown>;
export function decodedParser(
  mimeType: MimeType,
  { expecting = Statuses.successful, schema }: DecodedParserOptions = {},
): ResponseParser<unknown> {
  return {
    mimeType,
    expecting,
    async decode(response, codecs) {
      const [err, value] = codecs.decode(response.body, mimeType);
      if (err) {
        return [err, null];
      }

      if (!schema) {
        return [null, value];
      }

      return validator(value, schema);
    },
  };
}

/** Decodes the body as JSON, validated against `schema` when one is given. */
export function jsonParser<S extends StandardSchemaV1>(
  options: DecodedParserOptions<S> & { schema: S },
): ResponseParser<StandardSchemaV1.InferOutput<S>>;
export function jsonParser(options?: DecodedParserOptions): ResponseParser<unknown>;
export function jsonParser(options?: DecodedParserOptions): ResponseParser<unknown> {
  return decodedParser(MimeTypes.json, options);
}
