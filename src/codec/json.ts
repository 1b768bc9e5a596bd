import { MimeTypes } from '../types/request.js';
import type { Codec } from './types.js';

/** Options for {@link createJsonCodec} */
export interface JsonCodecOptions {
  /** Passed to `JSON.stringify` */
  replacer?: (this: unknown, key: string, value: unknown) => unknown;
  /** Passed to `JSON.parse` */
  reviver?: (this: unknown, key: string, value: unknown) => unknown;
  /** Indentation passed to `JSON.stringify` */
  space?: string | number;
}

/**
 * Creates a UTF-8 JSON codec.
 *
 * Encoding fails for values without a JSON representation (e.g. `undefined` or a function);
 * decoding fails for invalid UTF-8 and invalid JSON, including an empty body.
 */
export function createJsonCodec({ replacer, reviver, space }: JsonCodecOptions = {}): Codec {
  const encoder = new TextEncoder();
  const decoder = new TextDecoder('utf-8', { fatal: true });

  return {
    mimeType: MimeTypes.json,
    encode(value) {
      const text: string | undefined = JSON.stringify(value, replacer, space);
      if (text === undefined) {
        throw new Error(`error encoding value of type ${typeof value} as json`);
      }

      return encoder.encode(text);
    },
    decode(bytes) {
      const parsed: unknown = JSON.parse(decoder.decode(bytes), reviver);
      return parsed;
    },
  };
}

/** Default JSON codec. */
export const jsonCodec: Codec = createJsonCodec();
