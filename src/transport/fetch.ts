import { getTimeoutError } from '../error/timeoutError.js';
import type { HttpRequest, HttpResponse } from '../types/request.js';
import { createTimeoutSignal, linkSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { Transport, TransportSendOptions } from './types.js';
import { fromFetchHeaders, toFetchHeaders } from './utils.js';

/** Fetch options the transport passes through untouched. */
export type FetchInit = Omit<RequestInit, 'body' | 'headers' | 'method' | 'redirect' | 'signal'>;

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /**
   * Fetch implementation to use.
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
  /** Extra options for every request (e.g. `credentials`, `keepalive`) */
  init?: FetchInit;
}

/**
 * {@link Transport} backed by the `fetch` API.
 *
 * - `followRedirects` maps to `redirect: 'follow'` or `'manual'`.
 * - The call's signal is linked with a timeout signal; a timeout surfaces as a
 *   `TimeoutError` cause.
 * - The body is read fully into bytes.
 */
export class FetchTransport implements Transport {
  /** Fetch implementation used for every request. */
  #fetch: typeof fetch;
  /** Default fetch options. */
  #init: FetchInit;

  /** Creates a new transport, optionally with a custom fetch and default options */
  constructor({ fetch: fetchImpl = globalThis.fetch, init = {} }: FetchTransportOptions = {}) {
    this.#fetch = fetchImpl;
    this.#init = init;
  }

  /**
   * Sends `request`, returning `[error, response]`.
   */
  async send(request: HttpRequest, { signal, timeout }: TransportSendOptions): SafeWrapAsync<Error, HttpResponse> {
    const timeoutSignal = createTimeoutSignal(timeout);
    const linked = linkSignals([signal, timeoutSignal?.signal]);

    try {
      const [err, res] = await safeWrapAsync(() =>
        this.#fetch(request.url, {
          ...this.#init,
          method: request.method,
          headers: toFetchHeaders(request.headers),
          body: request.body ?? undefined,
          redirect: request.followRedirects ? 'follow' : 'manual',
          signal: linked.signal,
        }),
      );
      if (err) {
        return [this.#failure(`error sending ${request.method} request`, err, linked.signal), null];
      }

      const [errBody, buffer] = await safeWrapAsync(() => res.arrayBuffer());
      if (errBody) {
        return [this.#failure(`error reading ${request.method} response body`, errBody, linked.signal), null];
      }

      return [null, { status: res.status, headers: fromFetchHeaders(res.headers), body: new Uint8Array(buffer) }];
    } finally {
      timeoutSignal?.clear();
      linked.release();
    }
  }

  /**
   * Wraps a fetch failure; when the timeout fired, its `TimeoutError` becomes the cause.
   */
  #failure(message: string, err: Error, signal: AbortSignal): Error {
    const timeoutError = signal.aborted ? getTimeoutError(signal.reason) : null;
    return new Error(message, { cause: timeoutError ?? err });
  }
}
