import { describe, expect, it } from 'vitest';
import {
  acceptHeader,
  contentTypeHeader,
  getHeader,
  mergeHeaders,
  removeHeader,
  setHeader,
  toHeaderList,
  userAgentHeader,
} from './headers.js';

describe('toHeaderList', () => {
  it('returns an empty list without headers', () => {
    expect(toHeaderList()).toEqual([]);
  });

  it('keeps record order and drops nullish values', () => {
    expect(toHeaderList({ 'X-A': '1', 'X-B': null, 'X-C': undefined, 'X-D': '4' })).toEqual([
      { name: 'X-A', value: '1' },
      { name: 'X-D', value: '4' },
    ]);
  });

  it('accepts tuples and header objects, keeping repeated names', () => {
    const tuples: Array<[string, string]> = [
      ['Accept', 'text/plain'],
      ['Accept', 'application/json'],
    ];

    expect(toHeaderList(tuples)).toEqual([
      { name: 'Accept', value: 'text/plain' },
      { name: 'Accept', value: 'application/json' },
    ]);
    expect(toHeaderList([{ name: 'X-Trace', value: 'abc' }])).toEqual([{ name: 'X-Trace', value: 'abc' }]);
  });

  it('accepts Headers instances', () => {
    expect(toHeaderList(new Headers({ 'X-Request-Id': '42' }))).toEqual([{ name: 'x-request-id', value: '42' }]);
  });
});

describe('getHeader', () => {
  it('matches names case-insensitively and returns the first value', () => {
    const headers = [
      { name: 'Set-Cookie', value: 'a=1' },
      { name: 'set-cookie', value: 'b=2' },
    ];

    expect(getHeader(headers, 'SET-COOKIE')).toBe('a=1');
    expect(getHeader(headers, 'Accept')).toBeNull();
  });
});

describe('setHeader', () => {
  it('replaces the first entry in place and drops later duplicates', () => {
    const headers = [
      { name: 'accept', value: 'text/plain' },
      { name: 'X-A', value: '1' },
      { name: 'ACCEPT', value: 'text/html' },
    ];

    expect(setHeader(headers, 'Accept', 'application/json')).toEqual([
      { name: 'Accept', value: 'application/json' },
      { name: 'X-A', value: '1' },
    ]);
  });

  it('appends missing headers without touching the input', () => {
    const headers = [{ name: 'X-A', value: '1' }];

    expect(setHeader(headers, 'X-B', '2')).toEqual([
      { name: 'X-A', value: '1' },
      { name: 'X-B', value: '2' },
    ]);
    expect(headers).toEqual([{ name: 'X-A', value: '1' }]);
  });
});

describe('removeHeader', () => {
  it('removes every entry with the name', () => {
    const headers = [
      { name: 'Cookie', value: 'a=1' },
      { name: 'X-A', value: '1' },
      { name: 'cookie', value: 'b=2' },
    ];

    expect(removeHeader(headers, 'COOKIE')).toEqual([{ name: 'X-A', value: '1' }]);
  });
});

describe('mergeHeaders', () => {
  it('lets local headers replace and remove global ones', () => {
    const merged = mergeHeaders(
      { 'User-Agent': 'inventory-sync/1.0', Authorization: 'Bearer test-token', 'X-A': '1' },
      { 'user-agent': 'inventory-sync/2.0', Authorization: null, 'X-B': '2' },
    );

    expect(merged).toEqual([
      { name: 'user-agent', value: 'inventory-sync/2.0' },
      { name: 'X-A', value: '1' },
      { name: 'X-B', value: '2' },
    ]);
  });
});

describe('header factories', () => {
  it('build the standard headers', () => {
    expect(contentTypeHeader('application/json')).toEqual({ name: 'Content-Type', value: 'application/json' });
    expect(acceptHeader('text/plain')).toEqual({ name: 'Accept', value: 'text/plain' });
    expect(userAgentHeader('inventory-sync/1.0')).toEqual({ name: 'User-Agent', value: 'inventory-sync/1.0' });
  });

  it('feed header lists', () => {
    expect(toHeaderList([userAgentHeader('inventory-sync/1.0'), acceptHeader('application/json')])).toEqual([
      { name: 'User-Agent', value: 'inventory-sync/1.0' },
      { name: 'Accept', value: 'application/json' },
    ]);
  });
});
