/**
 * Built-in interceptors. None is active unless passed to a client or a call.
 * @module
 */
export { type AuthInterceptorOptions, createAuthInterceptor } from './auth.js';
export { createHeadersInterceptor } from './headers.js';
export {
  createRetryInterceptor,
  defaultRetryStatusCodes,
  parseRetryAfter,
  type RetryInterceptorOptions,
} from './retry.js';
