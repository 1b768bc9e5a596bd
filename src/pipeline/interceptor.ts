import type { TransportError } from '../error/transportError.js';
import type { HttpRequest, HttpResponse } from '../types/request.js';
import type { Context } from './context.js';
import type { Evaluation } from './evaluation.js';

/** A value or a promise of it. */
export type Awaitable<T> = T | Promise<T>;

/**
 * A pipeline participant. Every step is optional.
 *
 * `prepare` runs in list order before the transport. `handle` (transport failures) and
 * `process` (every received response, whatever its status) run in reverse list order;
 * the first evaluation that is not `proceed` ends the pass.
 *
 * Interceptors are shared by concurrent calls; keep them stateless or guard their state.
 * Throwing from `prepare` fails the call with a `PreparationError`, from `handle` or
 * `process` with a `ProcessingError`.
 */
export interface Interceptor {
  /** Returns the request to send, e.g. with headers added or a signature applied */
  prepare?(request: HttpRequest, context: Context): Awaitable<HttpRequest>;
  /** Evaluates a failed transport call */
  handle?(error: TransportError, context: Context): Awaitable<Evaluation>;
  /** Evaluates a received response; `Evaluation.proceed(response)` rewrites it */
  process?(response: HttpResponse, context: Context): Awaitable<Evaluation>;
}
