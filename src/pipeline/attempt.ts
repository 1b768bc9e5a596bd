import type { Logger } from 'pino';
import { CanceledError } from '../error/canceledError.js';
import type { HttpFailure } from '../error/failure.js';
import { PreparationError } from '../error/preparationError.js';
import { ProcessingError } from '../error/processingError.js';
import { TransportError } from '../error/transportError.js';
import type { Transport } from '../transport/types.js';
import type { HttpRequest, HttpResponse } from '../types/request.js';
import { type SafeWrap, safeWrapAsync } from '../utils/wrap.js';
import { classifyResponse } from './classify.js';
import type { Context } from './context.js';
import { retryDelay } from './evaluation.js';
import type { Interceptor } from './interceptor.js';
import { notifyObservers, type Observer } from './observer.js';

/** Result of a single pass through the pipeline. */
export type AttemptOutcome =
  | { readonly type: 'success'; readonly response: HttpResponse }
  | { readonly type: 'failure'; readonly error: HttpFailure }
  | { readonly type: 'retry'; readonly delay: number };

/** Everything a pass needs besides its context. */
export interface AttemptOptions {
  /** Client interceptors followed by call interceptors */
  interceptors: readonly Interceptor[];
  observers: readonly Observer[];
  transport: Transport;
  /** Passed on to the transport */
  timeout: number | false;
  logger: Logger;
}

const failure = (error: HttpFailure): AttemptOutcome => ({ type: 'failure', error });

/** Failure for a call whose signal aborted. */
export function canceled(signal: AbortSignal): CanceledError {
  return new CanceledError('error request canceled', { cause: signal.reason });
}

/**
 * Runs one attempt: every `prepare` in order, the transport, then `handle` or `process`
 * in reverse order, and finally status classification.
 *
 * Cancellation is checked before each interceptor, after the transport and after each
 * evaluation; once observed, no further interceptor runs.
 */
export async function runAttempt(
  context: Context,
  { interceptors, observers, transport, timeout, logger }: AttemptOptions,
): Promise<AttemptOutcome> {
  const { signal } = context;
  let request: HttpRequest = context.request;

  for (const interceptor of interceptors) {
    if (signal.aborted) {
      return failure(canceled(signal));
    }

    const prepare = interceptor.prepare?.bind(interceptor);
    if (!prepare) {
      continue;
    }

    const current = request;
    const [err, prepared] = await safeWrapAsync(() => prepare(current, context));
    if (signal.aborted) {
      return failure(canceled(signal));
    }

    if (err) {
      return failure(new PreparationError('error preparing request', { cause: err }));
    }

    request = prepared;
  }

  if (signal.aborted) {
    return failure(canceled(signal));
  }

  const prepared = request;
  notifyObservers(observers, 'didPrepare', context, logger, (observer) => observer.didPrepare?.(prepared, context));

  const [errSend, sent] = await safeWrapAsync(() => transport.send(prepared, { signal, timeout }));
  if (signal.aborted) {
    return failure(canceled(signal));
  }

  const [errTransport, received]: SafeWrap<Error, HttpResponse> = errSend ? [errSend, null] : sent;
  if (errTransport) {
    const error =
      errTransport instanceof TransportError
        ? errTransport
        : new TransportError(`error sending ${prepared.method} request`, { cause: errTransport });
    notifyObservers(observers, 'didEncounter', context, logger, (observer) => observer.didEncounter?.(error, context));

    return handleTransportError(error, context, interceptors);
  }

  notifyObservers(observers, 'didReceive', context, logger, (observer) => observer.didReceive?.(received, context));

  return processResponse(received, context, interceptors);
}

async function handleTransportError(
  error: TransportError,
  context: Context,
  interceptors: readonly Interceptor[],
): Promise<AttemptOutcome> {
  const { signal } = context;
  for (const interceptor of [...interceptors].reverse()) {
    if (signal.aborted) {
      return failure(canceled(signal));
    }

    const handle = interceptor.handle?.bind(interceptor);
    if (!handle) {
      continue;
    }

    const [err, evaluation] = await safeWrapAsync(() => handle(error, context));
    if (signal.aborted) {
      return failure(canceled(signal));
    }

    if (err) {
      return failure(new ProcessingError('error handling transport failure', { cause: err }));
    }

    const delay = retryDelay(evaluation);
    if (delay !== null) {
      return { type: 'retry', delay };
    }
  }

  return failure(error);
}

async function processResponse(
  response: HttpResponse,
  context: Context,
  interceptors: readonly Interceptor[],
): Promise<AttemptOutcome> {
  const { signal } = context;
  let current = response;
  for (const interceptor of [...interceptors].reverse()) {
    if (signal.aborted) {
      return failure(canceled(signal));
    }

    const process = interceptor.process?.bind(interceptor);
    if (!process) {
      continue;
    }

    const received = current;
    const [err, evaluation] = await safeWrapAsync(() => process(received, context));
    if (signal.aborted) {
      return failure(canceled(signal));
    }

    if (err) {
      return failure(new ProcessingError('error processing response', { cause: err }));
    }

    if (evaluation.type === 'proceed') {
      current = evaluation.response ?? current;
      continue;
    }

    return { type: 'retry', delay: retryDelay(evaluation) ?? 0 };
  }

  const [err, classified] = classifyResponse(current, context.codecs);
  if (err) {
    return failure(err);
  }

  return { type: 'success', response: classified };
}
