import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { UnexpectedResponseError } from '../error/unexpectedResponseError.js';
import { ValidationError } from '../error/validationError.js';
import type { HttpResponse } from '../types/request.js';
import { Status, Statuses } from '../types/status.js';
import {
  createParser,
  decodedParser,
  jsonParser,
  parseResponse,
  passthroughParser,
  textParser,
  voidParser,
} from './parser.js';
import { defaultCodecs } from './registry.js';

function response(status: number, body = ''): HttpResponse {
  return { status, headers: [], body: new TextEncoder().encode(body) };
}

describe('parseResponse', () => {
  it('decodes json within the expected statuses', async () => {
    const [err, value] = await parseResponse(jsonParser(), response(200, '{"a":[1,2]}'), defaultCodecs);

    expect(err).toBeNull();
    expect(value).toEqual({ a: [1, 2] });
  });

  it('rejects statuses the parser does not expect', async () => {
    const res = response(404, '{"message":"Not Found"}');
    const [err, value] = await parseResponse(jsonParser(), res, defaultCodecs);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(UnexpectedResponseError);
    expect(err?.message).toBe('error unexpected response status 404, expected Successful');
  });

  it('honours a custom expectation', async () => {
    const parser = jsonParser({ expecting: Statuses.ok });

    expect((await parseResponse(parser, response(201, '{}'), defaultCodecs))[0]).toBeInstanceOf(
      UnexpectedResponseError,
    );
    expect(await parseResponse(parser, response(200, '{}'), defaultCodecs)).toEqual([null, {}]);
  });

  it('accepts any status when expecting is null', async () => {
    const [err, value] = await parseResponse(textParser({ expecting: null }), response(500, 'oops'), defaultCodecs);

    expect(err).toBeNull();
    expect(value).toBe('oops');
  });

  it('validates with a schema', async () => {
    const parser = jsonParser({ schema: z.object({ id: z.number() }) });
    const [okErr, ok] = await parseResponse(parser, response(200, '{"id":3}'), defaultCodecs);
    const [badErr, bad] = await parseResponse(parser, response(200, '{"id":"3"}'), defaultCodecs);

    expect(okErr).toBeNull();
    expect(ok?.id).toBe(3);
    expect(bad).toBeNull();
    expect(badErr).toBeInstanceOf(ValidationError);
  });

  it('returns codec errors', async () => {
    const [err] = await parseResponse(jsonParser(), response(200, ''), defaultCodecs);

    expect(err).toBeInstanceOf(SyntaxError);
  });

  it('catches parsers that throw', async () => {
    const parser = {
      mimeType: null,
      expecting: null,
      decode: () => {
        throw new Error('broken parser');
      },
    };
    const [err] = await parseResponse(parser, response(200), defaultCodecs);

    expect(err?.message).toBe('broken parser');
  });
});

describe('built-in parsers', () => {
  it('passthrough returns the response', async () => {
    const res = response(204);
    const [, value] = await parseResponse(passthroughParser(), res, defaultCodecs);

    expect(value).toBe(res);
  });

  it('void ignores the body', async () => {
    const parser = voidParser();

    expect(parser.mimeType).toBeNull();
    expect(await parseResponse(parser, response(200, 'ignored'), defaultCodecs)).toEqual([null, undefined]);
  });

  it('decoded parser uses the given mime type', async () => {
    const parser = decodedParser('application/vnd.api+json');

    expect(parser.mimeType).toBe('application/vnd.api+json');
    expect(await parseResponse(parser, response(200, '[1]'), defaultCodecs)).toEqual([null, [1]]);
  });

  it('custom parsers may throw', async () => {
    const parser = createParser(
      'text/csv',
      (res) => {
        const body = new TextDecoder().decode(res.body);
        if (!body) {
          throw new Error('empty csv');
        }

        return body.split(',');
      },
      { expecting: new Status([[200, 300], [304, 305]], 'ok or not modified') },
    );

    expect(await parseResponse(parser, response(304, 'a,b'), defaultCodecs)).toEqual([null, ['a', 'b']]);
    expect((await parseResponse(parser, response(200), defaultCodecs))[0]?.message).toBe('empty csv');
  });
});
