import type { HttpRequest, HttpResponse } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Per-send options handed to a {@link Transport}. */
export interface TransportSendOptions {
  /** Aborts when the call is canceled; the transport should stop in-flight work */
  signal: AbortSignal;
  /** Milliseconds the exchange may take, `false` for no limit */
  timeout: number | false;
}

/**
 * Sends a prepared request and returns the status, headers and body.
 * Failures are returned as errors, never as non-2xx responses.
 */
export interface Transport {
  send(request: HttpRequest, options: TransportSendOptions): SafeWrapAsync<Error, HttpResponse>;
}
