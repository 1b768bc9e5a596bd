import { pino, type Logger } from 'pino';
import { parseResponse, type ResponseParser } from '../codec/parser.js';
import { encodePayload, RequestPayload } from '../codec/payload.js';
import { type CodecRegistry, defaultCodecs } from '../codec/registry.js';
import { CanceledError } from '../error/canceledError.js';
import { DecodingError } from '../error/decodingError.js';
import type { HttpFailure } from '../error/failure.js';
import { createContext, type Tags } from '../pipeline/context.js';
import type { Interceptor } from '../pipeline/interceptor.js';
import type { Observer } from '../pipeline/observer.js';
import { runPipeline } from '../pipeline/retry.js';
import { FetchTransport } from '../transport/fetch.js';
import type { Transport } from '../transport/types.js';
import type { HeaderOptions, HttpMethod, HttpRequest, HttpResponse, MimeType } from '../types/request.js';
import { acceptHeader, contentTypeHeader, setHeader, toHeaderList } from '../utils/headers.js';
import { createRequest } from '../utils/request.js';
import { linkSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { EmptyStatusCodes, Endpoint } from './endpoint.js';

/** Retry budget used when none (or no finite one) is configured. */
const defaultMaxRetryCount = 5;

/** Configuration for constructing an {@link HttpClient}. Resolved once; there is no reconfiguration. */
export interface HttpClientOptions {
  /**
   * Sends prepared requests.
   * @default new FetchTransport()
   */
  transport?: Transport;
  /**
   * Codecs used to encode payloads and decode responses.
   * @default defaultCodecs
   */
  codecs?: CodecRegistry;
  /** Interceptors applied to every call, before the call's own */
  interceptors?: readonly Interceptor[];
  /** Observers notified for every call */
  observers?: readonly Observer[];
  /**
   * Retries allowed after the first attempt. Fractions round down, negative values count as 0
   * and non-finite values fall back to the default.
   * @default 5
   */
  maxRetryCount?: number;
  /**
   * Milliseconds a single exchange may take, enforced by the transport. `false`, `0` and negative values disable it.
   * @default 30000
   */
  timeout?: number | false;
  /**
   * Logger for retry decisions and observer failures.
   * @default a disabled pino logger
   */
  logger?: Logger;
}

/** Per-call options of {@link HttpClient.send}. */
export interface SendOptions {
  /** Interceptors for this call only, applied after the client's */
  interceptors?: readonly Interceptor[];
  /** Labels visible to interceptors and observers through the context */
  tags?: Tags;
  /** Cancels the call */
  signal?: AbortSignal;
  /** Codecs for this call, replacing the client's */
  codecs?: CodecRegistry;
}

/** Per-call options of {@link HttpClient.fetch}. */
export interface FetchOptions<T> extends SendOptions {
  url: string;
  /** @default 'GET' */
  method?: HttpMethod;
  /** @default RequestPayload.empty() */
  payload?: RequestPayload;
  /** Turns the response into the result; its MIME type becomes the `Accept` header */
  parser: ResponseParser<T>;
  /** Extra headers; `Content-Type` and `Accept` always come from the payload and the parser */
  headers?: HeaderOptions;
  /** @default true */
  followRedirects?: boolean;
}

/** Options of the per-method helpers such as {@link HttpClient.get}. */
export type VerbOptions<T> = Omit<FetchOptions<T>, 'url' | 'method' | 'payload'>;

/**
 * Request pipeline client.
 *
 * Every call runs the interceptor chain (client interceptors, then call interceptors), the
 * transport and status classification, retrying only when an interceptor asks for it.
 * Calls never throw: they return `[failure, null]` or `[null, data]`, where the failure is one
 * of the {@link HttpFailure} classes.
 *
 * A client holds no per-call state and can serve concurrent calls.
 *
 * @example
 * const client = new HttpClient({ interceptors: [createRetryInterceptor()] });
 * const [err, user] = await client.fetch({
 *   url: 'https://api.example.com/users/1',
 *   parser: jsonParser({ schema: userSchema }),
 * });
 */
export class HttpClient {
  /** Transport sending prepared requests. */
  #transport: Transport;
  /** Default codecs. */
  #codecs: CodecRegistry;
  /** Client-level interceptors. */
  #interceptors: readonly Interceptor[];
  /** Observers for every call. */
  #observers: readonly Observer[];
  /** Retry budget per call. */
  #maxRetryCount: number;
  /** Transport timeout. */
  #timeout: number | false;
  /** Structured logger. */
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController = new AbortController();

  /** Creates a new client; every option has a default */
  constructor({
    transport = new FetchTransport(),
    codecs = defaultCodecs,
    interceptors = [],
    observers = [],
    maxRetryCount = defaultMaxRetryCount,
    timeout = 30_000,
    logger = pino({ enabled: false }),
  }: HttpClientOptions = {}) {
    this.#transport = transport;
    this.#codecs = codecs;
    this.#interceptors = Object.freeze([...interceptors]);
    this.#observers = Object.freeze([...observers]);
    this.#maxRetryCount = Number.isFinite(maxRetryCount)
      ? Math.max(0, Math.floor(maxRetryCount))
      : defaultMaxRetryCount;
    this.#timeout = timeout;
    this.#logger = logger;
  }

  /** Retries allowed after the first attempt. */
  get maxRetryCount(): number {
    return this.#maxRetryCount;
  }

  /** Transport timeout in milliseconds, or `false`. */
  get timeout(): number | false {
    return this.#timeout;
  }

  /** Whether {@link dispose} was called. */
  get disposed(): boolean {
    return this.#abortController.signal.aborted;
  }

  /**
   * Cancels every in-flight call and makes later calls fail right away, both with a {@link CanceledError}.
   */
  dispose() {
    if (!this.disposed) {
      this.#abortController.abort(new CanceledError('error client was disposed'));
    }
  }

  /**
   * Sends a prepared request through the pipeline.
   *
   * @returns `[null, response]` for a 2xx or 3xx outcome, otherwise `[failure, null]`.
   */
  async send(
    request: HttpRequest,
    { interceptors = [], tags, signal, codecs = this.#codecs }: SendOptions = {},
  ): SafeWrapAsync<HttpFailure, HttpResponse> {
    const linked = linkSignals([signal, this.#abortController.signal]);
    const context = createContext({ request, tags, signal: linked.signal, codecs });

    try {
      return await runPipeline(context, {
        interceptors: [...this.#interceptors, ...interceptors],
        observers: this.#observers,
        transport: this.#transport,
        timeout: this.#timeout,
        logger: this.#logger.child({ method: request.method, url: request.url }),
        maxRetryCount: this.#maxRetryCount,
      });
    } finally {
      linked.release();
    }
  }

  /**
   * Encodes `payload`, sends the request and parses the response with `parser`.
   *
   * With `emptyStatusCodes`, a response whose status is listed yields `null` without parsing.
   * Encoding failures are {@link EncodingError}s; parser failures, including a status the
   * parser does not expect, are {@link DecodingError}s.
   */
  fetch<T>(options: FetchOptions<T> & { emptyStatusCodes: EmptyStatusCodes }): SafeWrapAsync<HttpFailure, T | null>;
  fetch<T>(options: FetchOptions<T>): SafeWrapAsync<HttpFailure, T>;
  fetch<T>(options: FetchOptions<T> & { emptyStatusCodes?: EmptyStatusCodes }): SafeWrapAsync<HttpFailure, T | null> {
    return this.#fetch(options);
  }

  /**
   * Performs a GET request.
   * @example
   * const [err, users] = await client.get('https://api.example.com/users', { parser: jsonParser() });
   */
  get<T>(url: string, options: VerbOptions<T>): SafeWrapAsync<HttpFailure, T> {
    return this.fetch({ ...options, url, method: 'GET' });
  }

  /** Performs a POST request with `payload`. */
  post<T>(url: string, payload: RequestPayload, options: VerbOptions<T>): SafeWrapAsync<HttpFailure, T> {
    return this.fetch({ ...options, url, method: 'POST', payload });
  }

  /** Performs a PUT request with `payload`. */
  put<T>(url: string, payload: RequestPayload, options: VerbOptions<T>): SafeWrapAsync<HttpFailure, T> {
    return this.fetch({ ...options, url, method: 'PUT', payload });
  }

  /** Performs a PATCH request with `payload`. */
  patch<T>(url: string, payload: RequestPayload, options: VerbOptions<T>): SafeWrapAsync<HttpFailure, T> {
    return this.fetch({ ...options, url, method: 'PATCH', payload });
  }

  /** Performs a DELETE request. */
  delete<T>(url: string, options: VerbOptions<T>): SafeWrapAsync<HttpFailure, T> {
    return this.fetch({ ...options, url, method: 'DELETE' });
  }

  /**
   * Calls a reusable {@link Endpoint}. Call interceptors run after the endpoint's.
   */
  call<T>(
    endpoint: Endpoint<T> & { emptyStatusCodes: EmptyStatusCodes },
    options?: SendOptions,
  ): SafeWrapAsync<HttpFailure, T | null>;
  call<T>(endpoint: Endpoint<T>, options?: SendOptions): SafeWrapAsync<HttpFailure, T>;
  call<T>(endpoint: Endpoint<T>, options: SendOptions = {}): SafeWrapAsync<HttpFailure, T | null> {
    return this.#fetch({
      ...endpoint,
      ...options,
      interceptors: [...(endpoint.interceptors ?? []), ...(options.interceptors ?? [])],
    });
  }

  async #fetch<T>({
    url,
    method = 'GET',
    payload = RequestPayload.empty(),
    parser,
    headers,
    followRedirects,
    emptyStatusCodes,
    codecs = this.#codecs,
    ...sendOptions
  }: FetchOptions<T> & { emptyStatusCodes?: EmptyStatusCodes }): SafeWrapAsync<HttpFailure, T | null> {
    const [errEncode, encoded] = await encodePayload(payload, codecs);
    if (errEncode) {
      return [errEncode, null];
    }

    const request = createRequest({
      url,
      method,
      body: encoded.body,
      headers: this.#headers(headers, encoded.mimeType, parser.mimeType),
      followRedirects,
    });

    const [err, response] = await this.send(request, { ...sendOptions, codecs });
    if (err) {
      return [err, null];
    }

    if (emptyStatusCodes && new Set(emptyStatusCodes).has(response.status)) {
      return [null, null];
    }

    const [errParse, value] = await parseResponse(parser, response, codecs);
    if (errParse) {
      return [new DecodingError(`error decoding ${method} response`, { cause: errParse, response }), null];
    }

    return [null, value];
  }

  /**
   * Caller headers first, then `Content-Type` and `Accept` derived from the codecs in use.
   */
  #headers(headers: HeaderOptions | undefined, contentType: MimeType | null, accept: MimeType | null) {
    let list = toHeaderList(headers);
    const derived = [contentType && contentTypeHeader(contentType), accept && acceptHeader(accept)];
    for (const header of derived) {
      if (header) {
        list = setHeader(list, header.name, header.value);
      }
    }

    return list;
  }
}
