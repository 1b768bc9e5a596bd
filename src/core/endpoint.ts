import type { ResponseParser } from '../codec/parser.js';
import type { RequestPayload } from '../codec/payload.js';
import type { Interceptor } from '../pipeline/interceptor.js';
import type { HeaderOptions, HttpMethod } from '../types/request.js';

/** Statuses for which a call yields `null` instead of parsing the body. */
export type EmptyStatusCodes = Iterable<number>;

/**
 * A reusable description of one call: where it goes, what it sends and how the result is read.
 */
export interface Endpoint<T> {
  readonly url: string;
  readonly method?: HttpMethod;
  readonly payload?: RequestPayload;
  readonly parser: ResponseParser<T>;
  readonly headers?: HeaderOptions;
  readonly followRedirects?: boolean;
  /** Applied after the client's interceptors and before the call's */
  readonly interceptors?: readonly Interceptor[];
  readonly emptyStatusCodes?: EmptyStatusCodes;
}

/**
 * Freezes an endpoint description, keeping the `emptyStatusCodes` presence in its type.
 * @example
 * const deleteUser = (id: string) =>
 *   defineEndpoint({ url: `${base}/users/${id}`, method: 'DELETE', parser: voidParser(), emptyStatusCodes: [204] });
 */
export function defineEndpoint<E extends Endpoint<unknown>>(endpoint: E): Readonly<E> {
  return Object.freeze({ ...endpoint });
}
