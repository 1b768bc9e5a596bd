import { describe, expect, it, vi } from 'vitest';
import { defaultCodecs } from '../codec/registry.js';
import { createContext, nextAttempt } from '../pipeline/context.js';
import type { HttpRequest } from '../types/request.js';
import { getHeader } from '../utils/headers.js';
import { createRequest } from '../utils/request.js';
import { createAuthInterceptor } from './auth.js';

const request = createRequest({ url: 'https://api.example.com/me', method: 'GET', headers: { Accept: 'text/plain' } });
const context = createContext({ request, signal: new AbortController().signal, codecs: defaultCodecs });

describe('createAuthInterceptor', () => {
  it('adds a bearer token', async () => {
    const { prepare } = createAuthInterceptor({ token: () => 'test-token' });

    const prepared = await prepare?.(request, context);

    expect(prepared?.headers).toEqual([
      { name: 'Accept', value: 'text/plain' },
      { name: 'Authorization', value: 'Bearer test-token' },
    ]);
  });

  it('leaves the request alone without a token', async () => {
    const { prepare } = createAuthInterceptor({ token: async () => null });

    expect(await prepare?.(request, context)).toBe(request);
  });

  it('asks for the token on every attempt', async () => {
    const token = vi.fn((attempt: { retryCount: number }) => `test-token-${attempt.retryCount}`);
    const { prepare } = createAuthInterceptor({ token });

    const retried = await prepare?.(request, nextAttempt(context));

    expect(token).toHaveBeenCalledTimes(1);
    expect(getHeader(retried?.headers ?? [], 'Authorization')).toBe('Bearer test-token-1');
  });

  it('signs the authorized request for proof of possession', async () => {
    const signed: HttpRequest[] = [];
    const { prepare } = createAuthInterceptor({
      token: () => 'test-token',
      sign: (authorized) => {
        signed.push(authorized);
        return 'test-proof';
      },
    });

    const prepared = await prepare?.(request, context);

    expect(getHeader(prepared?.headers ?? [], 'Authorization')).toBe('DPoP test-token');
    expect(getHeader(prepared?.headers ?? [], 'DPoP')).toBe('test-proof');
    expect(getHeader(signed[0].headers, 'Authorization')).toBe('DPoP test-token');
  });

  it('supports custom headers without a scheme', async () => {
    const { prepare } = createAuthInterceptor({ token: () => 'test-key', header: 'X-Api-Key', scheme: '' });

    const prepared = await prepare?.(request, context);

    expect(getHeader(prepared?.headers ?? [], 'X-Api-Key')).toBe('test-key');
    expect(getHeader(prepared?.headers ?? [], 'Authorization')).toBeNull();
  });
});
