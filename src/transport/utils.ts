import type { Header } from '../types/request.js';

/**
 * Converts a header list into a fetch `Headers` instance; repeated names are appended.
 */
export function toFetchHeaders(headers: readonly Header[]): Headers {
  const result = new Headers();
  for (const { name, value } of headers) {
    result.append(name, value);
  }

  return result;
}

/**
 * Converts fetch `Headers` into an ordered header list. Names come back lowercased.
 */
export function fromFetchHeaders(headers: Headers): Header[] {
  const result: Header[] = [];
  headers.forEach((value, name) => {
    result.push({ name, value });
  });

  return result;
}
