import { MimeTypes } from '../types/request.js';
import type { Codec } from './types.js';

/**
 * Raw bytes codec for `application/octet-stream`. Accepts `Uint8Array` and `ArrayBuffer` values
 * and copies them, so callers can reuse their buffers.
 */
export const octetStreamCodec: Codec = {
  mimeType: MimeTypes.octetStream,
  encode(value) {
    if (value instanceof Uint8Array) {
      return value.slice();
    }

    if (value instanceof ArrayBuffer) {
      return new Uint8Array(value.slice(0));
    }

    throw new TypeError(`error encoding value of type ${typeof value} as binary`);
  },
  decode(bytes) {
    return bytes.slice();
  },
};
