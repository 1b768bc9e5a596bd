import type { Interceptor } from '../pipeline/interceptor.js';
import type { HeaderOptions } from '../types/request.js';
import { toHeaderList } from '../utils/headers.js';
import { withHeaders } from '../utils/request.js';

/**
 * Sets static headers (e.g. `User-Agent`) on every attempt, replacing same-named ones.
 * @example
 * new HttpClient({ interceptors: [createHeadersInterceptor([userAgentHeader('inventory-sync/1.0')])] });
 */
export function createHeadersInterceptor(headers: HeaderOptions): Interceptor {
  const list = Object.freeze(toHeaderList(headers));

  return {
    prepare: (request) => withHeaders(request, list),
  };
}
