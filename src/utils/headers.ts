import type { Header, HeaderOptions, MimeType } from '../types/request.js';

type HeaderEntry = readonly [name: string, value: unknown];

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return value == null || type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

function isEntryList(
  headers: HeaderOptions,
): headers is ReadonlyArray<Header> | ReadonlyArray<readonly [string, string]> {
  return Array.isArray(headers);
}

function isHeader(item: Header | readonly [string, string]): item is Header {
  return !Array.isArray(item);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): HeaderEntry[] {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (isEntryList(headers)) {
    const entries: HeaderEntry[] = [];
    for (const item of headers) {
      entries.push(isHeader(item) ? [item.name, item.value] : [item[0], item[1]]);
    }
    return entries;
  }

  return Object.entries(headers);
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Converts any supported header container into an ordered header list.
 * Entries without a usable value are dropped.
 */
export function toHeaderList(headers?: HeaderOptions): Header[] {
  const list: Header[] = [];
  for (const [name, value] of toEntries(headers)) {
    const clean = sanitize(value);
    if (clean !== null) {
      list.push({ name, value: clean });
    }
  }

  return list;
}

/** Returns the first value for `name` (case-insensitive), or `null`. */
export function getHeader(headers: readonly Header[], name: string): string | null {
  return headers.find((header) => sameName(header.name, name))?.value ?? null;
}

/** Removes every header named `name` (case-insensitive). */
export function removeHeader(headers: readonly Header[], name: string): Header[] {
  return headers.filter((header) => !sameName(header.name, name));
}

/**
 * Sets `name` to `value`, replacing the first existing entry in place and dropping duplicates.
 * Appends when the header is missing.
 */
export function setHeader(headers: readonly Header[], name: string, value: string): Header[] {
  const index = headers.findIndex((header) => sameName(header.name, name));
  if (index === -1) {
    return [...headers, { name, value }];
  }

  const result: Header[] = [];
  headers.forEach((header, i) => {
    if (i === index) {
      result.push({ name, value });
      return;
    }

    if (!sameName(header.name, name)) {
      result.push(header);
    }
  });

  return result;
}

/**
 * Merge global and local headers into a single list.
 * Local entries replace global ones; a local `null`/`undefined` removes the header.
 */
export function mergeHeaders(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Header[] {
  let merged = toHeaderList(globalHeaders);
  for (const [name, value] of toEntries(localHeaders)) {
    if (value == null) {
      merged = removeHeader(merged, name);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged = setHeader(merged, name, clean);
    }
  }

  return merged;
}

/** `Content-Type` header for a MIME tag. */
export function contentTypeHeader(mimeType: MimeType): Header {
  return { name: 'Content-Type', value: mimeType };
}

/** `Accept` header for a MIME tag. */
export function acceptHeader(mimeType: MimeType): Header {
  return { name: 'Accept', value: mimeType };
}

/** `User-Agent` header. */
export function userAgentHeader(value: string): Header {
  return { name: 'User-Agent', value };
}
