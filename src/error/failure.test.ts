import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { jsonParser, textParser } from '../codec/parser.js';
import type { HttpResponse } from '../types/request.js';
import { CanceledError } from './canceledError.js';
import { ClientError, getClientError, isClientError } from './clientError.js';
import { DecodingError, getDecodingError } from './decodingError.js';
import { EncodingError } from './encodingError.js';
import { type HttpFailure, isHttpFailure } from './failure.js';
import { getMaxRetryCountReachedError, MaxRetryCountReachedError } from './maxRetryCountReachedError.js';
import { PreparationError } from './preparationError.js';
import { ProcessingError } from './processingError.js';
import { isResponseError } from './responseError.js';
import { isServerError, ServerError } from './serverError.js';
import { TransportError } from './transportError.js';
import { UnexpectedStatusError } from './unexpectedStatusError.js';

function response(status: number, body: string): HttpResponse {
  return {
    status,
    headers: [{ name: 'Content-Type', value: 'application/json' }],
    body: new TextEncoder().encode(body),
  };
}

function describeFailure(failure: HttpFailure): string {
  switch (failure.kind) {
    case 'clientError':
    case 'serverError':
    case 'unexpectedStatus':
      return `${failure.kind}:${failure.status}`;
    case 'maxRetryCountReached':
      return `${failure.kind}:${failure.attempts}`;
    default:
      return failure.kind;
  }
}

describe('HttpFailure', () => {
  it('exposes one kind per class', () => {
    const res = response(418, '{}');
    const failures: HttpFailure[] = [
      new EncodingError('e'),
      new DecodingError('e'),
      new PreparationError('e'),
      new ProcessingError('e'),
      new TransportError('e'),
      new ClientError(res),
      new ServerError(response(503, '{}')),
      new UnexpectedStatusError(response(101, '')),
      new MaxRetryCountReachedError('e', 3),
      new CanceledError('e'),
    ];

    expect(failures.map(describeFailure)).toEqual([
      'encoding',
      'decoding',
      'preparation',
      'processing',
      'transport',
      'clientError:418',
      'serverError:503',
      'unexpectedStatus:101',
      'maxRetryCountReached:3',
      'canceled',
    ]);
    expect(failures.every(isHttpFailure)).toBe(true);
  });

  it('does not treat other errors as failures', () => {
    expect(isHttpFailure(new Error('boom'))).toBe(false);
    expect(isHttpFailure('boom')).toBe(false);
  });

  it('uses the class name as error name', () => {
    const failures: HttpFailure[] = [
      new EncodingError('x'),
      new DecodingError('x'),
      new PreparationError('x'),
      new ProcessingError('x'),
      new TransportError('x'),
      new ClientError(response(400, '')),
      new ServerError(response(500, '')),
      new UnexpectedStatusError(response(600, '')),
      new MaxRetryCountReachedError('x', 1),
      new CanceledError('stop'),
    ];

    for (const failure of failures) {
      expect(failure.name).toBe(failure.constructor.name);
    }
    expect(new ClientError(response(400, '')).name).toBe('ClientError');
    expect(new CanceledError('stop').name).toBe('CanceledError');
  });
});

describe('ResponseError', () => {
  it('describes the classified status', () => {
    const err = new ServerError(response(502, ''));

    expect(err.message).toBe('error received server error status 502');
    expect(isServerError(err)).toBe(true);
    expect(isResponseError(err)).toBe(true);
    expect(isClientError(err)).toBe(false);
  });

  it('parses the error body regardless of the parser expectation', async () => {
    const err = new ClientError(response(404, '{"message":"Not Found"}'));
    const [parseErr, body] = await err.parse(jsonParser({ schema: z.object({ message: z.string() }) }));

    expect(parseErr).toBeNull();
    expect(body).toEqual({ message: 'Not Found' });
  });

  it('can try several candidate decodings', async () => {
    const err = new ClientError(response(400, 'plain failure'));
    const [jsonErr] = await err.parse(jsonParser());
    const [, text] = await err.parse(textParser());

    expect(jsonErr).toBeInstanceOf(SyntaxError);
    expect(text).toBe('plain failure');
  });

  it('is found behind causes', () => {
    const err = new ClientError(response(409, ''));

    expect(getClientError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('DecodingError', () => {
  it('optionally holds the response', () => {
    const res = response(200, 'x');
    const withResponse = new DecodingError('error decoding', { response: res, cause: new Error('inner') });

    expect(withResponse.response).toBe(res);
    expect(withResponse.cause).toEqual(new Error('inner'));
    expect(new DecodingError('error decoding').response).toBeNull();
    expect(getDecodingError(new Error('outer', { cause: withResponse }))).toBe(withResponse);
  });
});

describe('MaxRetryCountReachedError', () => {
  it('exposes attempts', () => {
    const err = new MaxRetryCountReachedError('error max retry count reached', 6);

    expect(err.attempts).toBe(6);
    expect(getMaxRetryCountReachedError(err)).toBe(err);
  });
});
