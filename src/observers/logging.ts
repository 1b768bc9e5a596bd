import type { Logger } from 'pino';
import type { Context } from '../pipeline/context.js';
import type { Observer } from '../pipeline/observer.js';
import type { Header } from '../types/request.js';

/** Levels the logging observer can write at. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Options for {@link createLoggingObserver} */
export interface LoggingObserverOptions {
  /**
   * Level for prepared requests and received responses; transport failures are always `warn`.
   * @default 'debug'
   */
  level?: LogLevel;
  /**
   * Header names (case-insensitive) whose values are replaced by `[REDACTED]`.
   * @default defaultRedactedHeaders
   */
  redactHeaders?: readonly string[];
}

/** Headers redacted unless configured otherwise. */
export const defaultRedactedHeaders: readonly string[] = Object.freeze([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'dpop',
  'x-api-key',
]);

/**
 * Structured logging of every pipeline event with pino.
 * @example
 * new HttpClient({ observers: [createLoggingObserver(pino({ level: 'debug' }))] });
 */
export function createLoggingObserver(
  logger: Logger,
  { level = 'debug', redactHeaders = defaultRedactedHeaders }: LoggingObserverOptions = {},
): Observer {
  const redacted = new Set(redactHeaders.map((name) => name.toLowerCase()));

  const headerFields = (headers: readonly Header[]): Record<string, string> => {
    const fields: Record<string, string> = {};
    for (const { name, value } of headers) {
      const key = name.toLowerCase();
      const shown = redacted.has(key) ? '[REDACTED]' : value;
      fields[key] = key in fields ? `${fields[key]}, ${shown}` : shown;
    }

    return fields;
  };

  const callFields = (context: Context) => ({ retryCount: context.retryCount, tags: context.tags });

  return {
    didPrepare(request, context) {
      logger[level](
        { ...callFields(context), method: request.method, url: request.url, headers: headerFields(request.headers) },
        'request prepared',
      );
    },
    didEncounter(error, context) {
      logger.warn(
        { ...callFields(context), method: context.request.method, url: context.request.url, err: error },
        'transport failed',
      );
    },
    didReceive(response, context) {
      logger[level](
        {
          ...callFields(context),
          status: response.status,
          headers: headerFields(response.headers),
          bytes: response.body.byteLength,
        },
        'response received',
      );
    },
  };
}
