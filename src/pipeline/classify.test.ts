import { describe, expect, it } from 'vitest';
import { defaultCodecs } from '../codec/registry.js';
import { textCodec } from '../codec/text.js';
import { ClientError } from '../error/clientError.js';
import { ServerError } from '../error/serverError.js';
import { UnexpectedStatusError } from '../error/unexpectedStatusError.js';
import type { HttpResponse } from '../types/request.js';
import { classifyResponse } from './classify.js';

const response = (status: number): HttpResponse => ({ status, headers: [], body: new Uint8Array() });

describe('classifyResponse', () => {
  it.each([200, 204, 299, 301, 304, 399])('accepts %i', (status) => {
    const [err, result] = classifyResponse(response(status));

    expect(err).toBeNull();
    expect(result?.status).toBe(status);
  });

  it.each([400, 404, 429, 499])('reports %i as a client error', (status) => {
    const [err] = classifyResponse(response(status));

    expect(err).toBeInstanceOf(ClientError);
    expect(err?.message).toBe(`error received client error status ${status}`);
    expect(err?.kind).toBe('clientError');
  });

  it.each([500, 503, 599])('reports %i as a server error', (status) => {
    const [err] = classifyResponse(response(status));

    expect(err).toBeInstanceOf(ServerError);
    expect(err?.status).toBe(status);
  });

  it.each([100, 199, 600, 999])('reports %i as unexpected', (status) => {
    const [err] = classifyResponse(response(status));

    expect(err).toBeInstanceOf(UnexpectedStatusError);
    expect(err?.kind).toBe('unexpectedStatus');
  });

  it('keeps the full response on the error', () => {
    const original: HttpResponse = {
      status: 422,
      headers: [{ name: 'Content-Type', value: 'application/json' }],
      body: new TextEncoder().encode('{"field":"name"}'),
    };

    const [err] = classifyResponse(original);

    expect(err?.response).toBe(original);
  });

  it('hands the call codecs to the error', () => {
    const codecs = defaultCodecs.with(textCodec);

    const [withCodecs] = classifyResponse(response(400), codecs);
    const [withDefaults] = classifyResponse(response(500));

    expect(withCodecs?.codecs).toBe(codecs);
    expect(withDefaults?.codecs).toBe(defaultCodecs);
  });
});
