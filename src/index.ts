/**
 * Root entrypoint for fetchline: re-exports the client, pipeline contracts, codecs,
 * built-in interceptors and observers, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './codec/index.js';
export * from './core/index.js';
export * from './error/index.js';
export * from './interceptors/index.js';
export * from './observers/index.js';
export * from './pipeline/index.js';
export * from './transport/index.js';
export * from './types/index.js';

/** Header list helpers. */
export {
  acceptHeader,
  contentTypeHeader,
  getHeader,
  mergeHeaders,
  removeHeader,
  setHeader,
  toHeaderList,
  userAgentHeader,
} from './utils/headers.js';

/** Immutable request builders. */
export { type CreateRequestOptions, createRequest, withHeader, withHeaders, withoutHeader } from './utils/request.js';

/** Tuple results. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync, toError } from './utils/wrap.js';
