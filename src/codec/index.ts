export { octetStreamCodec } from './binary.js';
export { createJsonCodec, type JsonCodecOptions, jsonCodec } from './json.js';
export {
  createParser,
  type DecodedParserOptions,
  decodedParser,
  jsonParser,
  type ParserOptions,
  parseResponse,
  passthroughParser,
  type ResponseParser,
  textParser,
  voidParser,
} from './parser.js';
export { type EncodedPayload, encodePayload, type PayloadOptions, RequestPayload } from './payload.js';
export { CodecRegistry, defaultCodecs, mimeEssence } from './registry.js';
export { textCodec } from './text.js';
export type { Codec } from './types.js';
