/** HTTP methods understood by the pipeline. */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * MIME type tag, e.g. `application/json`. Tags select codecs and drive the
 * `Content-Type` and `Accept` headers.
 */
export type MimeType = string;

/** Commonly used MIME type tags. */
export const MimeTypes = {
  json: 'application/json',
  text: 'text/plain',
  octetStream: 'application/octet-stream',
} as const satisfies Record<string, MimeType>;

/** A single HTTP header; header lists keep their order and may repeat names. */
export interface Header {
  readonly name: string;
  readonly value: string;
}

/** Header container shapes accepted wherever headers are supplied by callers. */
export type HeaderOptions =
  | Headers
  | ReadonlyArray<Header>
  | ReadonlyArray<readonly [string, string]>
  | Record<string, string | null | undefined>;

/**
 * An outgoing call before it reaches the transport.
 * Requests are frozen; interceptors return new requests from `prepare`.
 */
export interface HttpRequest {
  /** Absolute target address. */
  readonly url: string;
  readonly method: HttpMethod;
  /** Encoded body, `null` when the request carries none. */
  readonly body: Uint8Array | null;
  readonly headers: readonly Header[];
  /** Whether the transport should follow redirects on its own. */
  readonly followRedirects: boolean;
}

/** Result of a completed exchange. */
export interface HttpResponse {
  readonly status: number;
  readonly headers: readonly Header[];
  readonly body: Uint8Array;
}
