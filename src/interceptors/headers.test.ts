import { describe, expect, it } from 'vitest';
import { defaultCodecs } from '../codec/registry.js';
import { createContext } from '../pipeline/context.js';
import { userAgentHeader } from '../utils/headers.js';
import { createRequest } from '../utils/request.js';
import { createHeadersInterceptor } from './headers.js';

describe('createHeadersInterceptor', () => {
  it('sets the configured headers, replacing same-named ones', async () => {
    const request = createRequest({
      url: 'https://api.example.com/catalog',
      method: 'GET',
      headers: { 'user-agent': 'default', Accept: 'application/json' },
    });
    const context = createContext({ request, signal: new AbortController().signal, codecs: defaultCodecs });
    const { prepare } = createHeadersInterceptor({ 'User-Agent': 'inventory-sync/1.0', 'X-Region': 'eu-west' });

    const prepared = await prepare?.(request, context);

    expect(prepared?.headers).toEqual([
      { name: 'User-Agent', value: 'inventory-sync/1.0' },
      { name: 'Accept', value: 'application/json' },
      { name: 'X-Region', value: 'eu-west' },
    ]);
  });

  it('accepts header lists', async () => {
    const request = createRequest({ url: 'https://api.example.com/catalog', method: 'GET' });
    const context = createContext({ request, signal: new AbortController().signal, codecs: defaultCodecs });
    const { prepare } = createHeadersInterceptor([userAgentHeader('inventory-sync/1.0')]);

    const prepared = await prepare?.(request, context);

    expect(prepared?.headers).toEqual([{ name: 'User-Agent', value: 'inventory-sync/1.0' }]);
  });
});
