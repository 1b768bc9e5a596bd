import type { MimeType } from '../types/request.js';

/**
 * Converts values to and from wire bytes for a single MIME type.
 * Codecs are stateless; `encode` and `decode` may throw.
 */
export interface Codec {
  /** MIME type the codec handles */
  readonly mimeType: MimeType;
  /** Serializes `value` into body bytes */
  encode(value: unknown): Uint8Array;
  /** Deserializes body bytes */
  decode(bytes: Uint8Array): unknown;
}
