/**
 * Core entrypoint: exports the client and endpoint descriptions.
 * Import from here if you only need the client without codecs or error helpers.
 * @module
 */

/**
 * Request pipeline client and its options.
 */
export { type FetchOptions, HttpClient, type HttpClientOptions, type SendOptions, type VerbOptions } from './client.js';

/**
 * Reusable call descriptions for {@link HttpClient.call}.
 */
export { defineEndpoint, type EmptyStatusCodes, type Endpoint } from './endpoint.js';
