import { MimeTypes } from '../types/request.js';
import type { Codec } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/**
 * UTF-8 plain text codec. Only strings can be encoded.
 */
export const textCodec: Codec = {
  mimeType: MimeTypes.text,
  encode(value) {
    if (typeof value !== 'string') {
      throw new TypeError(`error encoding value of type ${typeof value} as text`);
    }

    return encoder.encode(value);
  },
  decode(bytes) {
    return decoder.decode(bytes);
  },
};
