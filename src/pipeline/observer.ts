import type { Logger } from 'pino';
import type { TransportError } from '../error/transportError.js';
import type { HttpRequest, HttpResponse } from '../types/request.js';
import { safeWrap, toError } from '../utils/wrap.js';
import type { Context } from './context.js';
import type { Awaitable } from './interceptor.js';

/**
 * Notification sink. Observers never affect the outcome of a call: their return values are
 * ignored and anything they throw (or reject with) is logged and dropped.
 */
export interface Observer {
  /** After every `prepare` step ran, right before the transport */
  didPrepare?(request: HttpRequest, context: Context): Awaitable<void>;
  /** After the transport failed, before `handle` */
  didEncounter?(error: TransportError, context: Context): Awaitable<void>;
  /** After a response arrived, before `process` */
  didReceive?(response: HttpResponse, context: Context): Awaitable<void>;
}

/** Observer hook names. */
export type ObserverEvent = keyof Observer;

/**
 * Calls `notify` for each observer in order, isolating failures.
 */
export function notifyObservers(
  observers: readonly Observer[],
  event: ObserverEvent,
  context: Context,
  logger: Logger,
  notify: (observer: Observer) => Awaitable<void>,
): void {
  const warn = (err: Error) =>
    logger.warn({ err, event, retryCount: context.retryCount, tags: context.tags }, 'observer failed');

  for (const observer of observers) {
    const [err, pending] = safeWrap(() => notify(observer));
    if (err) {
      warn(err);
      continue;
    }

    if (pending instanceof Promise) {
      pending.catch((error: unknown) => warn(toError(error)));
    }
  }
}
