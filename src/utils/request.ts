import type { Header, HeaderOptions, HttpMethod, HttpRequest } from '../types/request.js';
import { removeHeader, setHeader, toHeaderList } from './headers.js';

/** Inputs accepted by {@link createRequest}. */
export interface CreateRequestOptions {
  url: string;
  method: HttpMethod;
  body?: Uint8Array | null;
  headers?: HeaderOptions;
  /** @default true */
  followRedirects?: boolean;
}

function freeze(request: HttpRequest): HttpRequest {
  return Object.freeze({ ...request, headers: Object.freeze([...request.headers]) });
}

/**
 * Builds a frozen {@link HttpRequest}.
 */
export function createRequest({
  url,
  method,
  body = null,
  headers,
  followRedirects = true,
}: CreateRequestOptions): HttpRequest {
  return freeze({ url, method, body, headers: toHeaderList(headers), followRedirects });
}

/** Returns a copy of `request` with `name` set to `value`. */
export function withHeader(request: HttpRequest, name: string, value: string): HttpRequest {
  return freeze({ ...request, headers: setHeader(request.headers, name, value) });
}

/** Returns a copy of `request` with every given header set, in order. */
export function withHeaders(request: HttpRequest, headers: HeaderOptions): HttpRequest {
  let result: Header[] = [...request.headers];
  for (const header of toHeaderList(headers)) {
    result = setHeader(result, header.name, header.value);
  }

  return freeze({ ...request, headers: result });
}

/** Returns a copy of `request` without any `name` header. */
export function withoutHeader(request: HttpRequest, name: string): HttpRequest {
  return freeze({ ...request, headers: removeHeader(request.headers, name) });
}
