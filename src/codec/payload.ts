import type { StandardSchemaV1 } from '@standard-schema/spec';
import { EncodingError } from '../error/encodingError.js';
import { type MimeType, MimeTypes } from '../types/request.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { CodecRegistry } from './registry.js';

/**
 * What a request sends: nothing, raw bytes, or a value to encode with the codec for its MIME type.
 * The MIME type becomes the request's `Content-Type`.
 */
export type RequestPayload =
  | { readonly type: 'empty' }
  | { readonly type: 'data'; readonly body: Uint8Array; readonly mimeType: MimeType | null }
  | {
      readonly type: 'encoded';
      readonly value: unknown;
      readonly mimeType: MimeType;
      readonly schema: StandardSchemaV1 | null;
    };

/** Options for payloads that encode a value */
export interface PayloadOptions<S extends StandardSchemaV1 = StandardSchemaV1> {
  /** Validates (and may transform) the value before encoding */
  schema?: S;
}

/** Result of {@link encodePayload}. */
export interface EncodedPayload {
  body: Uint8Array | null;
  mimeType: MimeType | null;
}

function encoded<S extends StandardSchemaV1>(
  value: StandardSchemaV1.InferInput<S>,
  mimeType: MimeType,
  options: PayloadOptions<S> & { schema: S },
): RequestPayload;
function encoded(value: unknown, mimeType: MimeType, options?: PayloadOptions): RequestPayload;
function encoded(value: unknown, mimeType: MimeType, { schema }: PayloadOptions = {}): RequestPayload {
  return { type: 'encoded', value, mimeType, schema: schema ?? null };
}

function json<S extends StandardSchemaV1>(
  value: StandardSchemaV1.InferInput<S>,
  options: PayloadOptions<S> & { schema: S },
): RequestPayload;
function json(value: unknown, options?: PayloadOptions): RequestPayload;
function json(value: unknown, options: PayloadOptions = {}): RequestPayload {
  return encoded(value, MimeTypes.json, options);
}

/**
 * Payload factories.
 * @example
 * RequestPayload.json({ name: 'Ada' }, { schema: userSchema });
 */
export const RequestPayload = {
  /** No body and no `Content-Type`. */
  empty(): RequestPayload {
    return { type: 'empty' };
  },
  /** Raw bytes, sent as-is; `Content-Type` only when `mimeType` is given. */
  data(body: Uint8Array, mimeType: MimeType | null = null): RequestPayload {
    return { type: 'data', body, mimeType };
  },
  /** UTF-8 plain text. */
  text(value: string): RequestPayload {
    return encoded(value, MimeTypes.text);
  },
  json,
  encoded,
};

/**
 * Validates and encodes a payload with the given codecs.
 * Every failure is an {@link EncodingError}; validation failures carry a `ValidationError` cause.
 */
export async function encodePayload(
  payload: RequestPayload,
  codecs: CodecRegistry,
): SafeWrapAsync<EncodingError, EncodedPayload> {
  switch (payload.type) {
    case 'empty':
      return [null, { body: null, mimeType: null }];
    case 'data':
      return [null, { body: payload.body, mimeType: payload.mimeType }];
    case 'encoded': {
      let value = payload.value;
      if (payload.schema) {
        const [errValidation, validated] = await validator(value, payload.schema);
        if (errValidation) {
          return [new EncodingError('error validating request payload', { cause: errValidation }), null];
        }

        value = validated;
      }

      const [err, body] = codecs.encode(value, payload.mimeType);
      if (err) {
        return [new EncodingError(`error encoding request payload as ${payload.mimeType}`, { cause: err }), null];
      }

      return [null, { body, mimeType: payload.mimeType }];
    }
  }
}
