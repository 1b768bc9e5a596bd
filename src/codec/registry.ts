import { MimeTypes, type MimeType } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { octetStreamCodec } from './binary.js';
import { jsonCodec } from './json.js';
import { textCodec } from './text.js';
import type { Codec } from './types.js';

/**
 * Returns the essence of a MIME type: lowercased, without parameters.
 * @example
 * mimeEssence('Application/JSON; charset=utf-8'); // 'application/json'
 */
export function mimeEssence(mimeType: MimeType): string {
  return mimeType.split(';')[0].trim().toLowerCase();
}

/**
 * Immutable lookup of codecs by MIME type.
 *
 * Lookups ignore case and parameters; any `+json` structured suffix
 * (e.g. `application/problem+json`) falls back to the JSON codec.
 */
export class CodecRegistry {
  readonly #codecs: ReadonlyMap<string, Codec>;

  /** Creates a registry; later codecs replace earlier ones for the same MIME type */
  constructor(codecs: Iterable<Codec> = []) {
    const map = new Map<string, Codec>();
    for (const codec of codecs) {
      map.set(mimeEssence(codec.mimeType), codec);
    }

    this.#codecs = map;
  }

  /** Returns a copy with `codecs` added, replacing existing ones for the same MIME type. */
  with(...codecs: Codec[]): CodecRegistry {
    return new CodecRegistry([...this.#codecs.values(), ...codecs]);
  }

  /** Finds the codec for `mimeType`, or `null`. */
  get(mimeType: MimeType): Codec | null {
    const essence = mimeEssence(mimeType);
    const codec = this.#codecs.get(essence);
    if (codec) {
      return codec;
    }

    if (essence.endsWith('+json')) {
      return this.#codecs.get(MimeTypes.json) ?? null;
    }

    return null;
  }

  /** Encodes `value` with the codec for `mimeType`. */
  encode(value: unknown, mimeType: MimeType): SafeWrap<Error, Uint8Array> {
    const codec = this.get(mimeType);
    if (!codec) {
      return [new Error(`error no codec registered for ${mimeType}`), null];
    }

    return safeWrap(() => codec.encode(value));
  }

  /** Decodes `bytes` with the codec for `mimeType`. */
  decode(bytes: Uint8Array, mimeType: MimeType): SafeWrap<Error, unknown> {
    const codec = this.get(mimeType);
    if (!codec) {
      return [new Error(`error no codec registered for ${mimeType}`), null];
    }

    return safeWrap(() => codec.decode(bytes));
  }
}

/** Registry holding the JSON, text and octet-stream codecs. */
export const defaultCodecs = new CodecRegistry([jsonCodec, textCodec, octetStreamCodec]);
