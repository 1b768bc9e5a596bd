import { pino } from 'pino';
import { describe, expect, it } from 'vitest';
import { defaultCodecs } from '../codec/registry.js';
import { TransportError } from '../error/transportError.js';
import { createContext } from '../pipeline/context.js';
import { createRequest } from '../utils/request.js';
import { createLoggingObserver, type LoggingObserverOptions } from './logging.js';

const request = createRequest({
  url: 'https://api.example.com/orders',
  method: 'POST',
  headers: { Authorization: 'Bearer test-token', Accept: 'application/json' },
});
const context = createContext({
  request,
  tags: { operation: 'create-order' },
  signal: new AbortController().signal,
  codecs: defaultCodecs,
});

function setup(options?: LoggingObserverOptions) {
  const lines: string[] = [];
  const destination = { write: (line: string) => lines.push(line) };
  const logger = pino({ level: 'trace', base: null, timestamp: false }, destination);
  const observer = createLoggingObserver(logger, options);

  return { observer, records: () => lines.map((line) => JSON.parse(line)) };
}

describe('createLoggingObserver', () => {
  it('logs prepared requests with redacted credentials', () => {
    const { observer, records } = setup();

    observer.didPrepare?.(request, context);

    expect(records()).toEqual([
      {
        level: 20,
        retryCount: 0,
        tags: { operation: 'create-order' },
        method: 'POST',
        url: 'https://api.example.com/orders',
        headers: { authorization: '[REDACTED]', accept: 'application/json' },
        msg: 'request prepared',
      },
    ]);
  });

  it('logs received responses, joining repeated headers', () => {
    const { observer, records } = setup({ level: 'info' });

    observer.didReceive?.(
      {
        status: 201,
        headers: [
          { name: 'Set-Cookie', value: 'a=1' },
          { name: 'set-cookie', value: 'b=2' },
          { name: 'X-Request-Id', value: 'r-1' },
        ],
        body: new TextEncoder().encode('{"id":1}'),
      },
      context,
    );

    expect(records()).toEqual([
      {
        level: 30,
        retryCount: 0,
        tags: { operation: 'create-order' },
        status: 201,
        headers: { 'set-cookie': '[REDACTED], [REDACTED]', 'x-request-id': 'r-1' },
        bytes: 8,
        msg: 'response received',
      },
    ]);
  });

  it('logs transport failures as warnings', () => {
    const { observer, records } = setup();

    observer.didEncounter?.(new TransportError('error sending POST request'), context);

    expect(records()[0]).toMatchObject({
      level: 40,
      method: 'POST',
      url: 'https://api.example.com/orders',
      err: { type: 'TransportError', message: 'error sending POST request' },
      msg: 'transport failed',
    });
  });

  it('redacts only the configured headers', () => {
    const { observer, records } = setup({ redactHeaders: ['Accept'] });

    observer.didPrepare?.(request, context);

    expect(records()[0].headers).toEqual({ authorization: 'Bearer test-token', accept: '[REDACTED]' });
  });
});
