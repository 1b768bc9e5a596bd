/**
 * Transport entrypoint: exports the fetch-backed transport and the transport contract.
 * @module
 */
export { type FetchInit, FetchTransport, type FetchTransportOptions } from './fetch.js';
export type { Transport, TransportSendOptions } from './types.js';
