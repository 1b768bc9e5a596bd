import type { Context } from '../pipeline/context.js';
import { Evaluation } from '../pipeline/evaluation.js';
import type { Interceptor } from '../pipeline/interceptor.js';
import type { HttpResponse } from '../types/request.js';
import { getHeader } from '../utils/headers.js';

/** Options for {@link createRetryInterceptor} */
export interface RetryInterceptorOptions {
  /**
   * The number of times to retry failed requests.
   * @default 2
   */
  limit?: number;
  /**
   * Milliseconds to wait before retrying.
   * @default 1000
   */
  delay?: number;
  /**
   * `exponential` doubles the delay on every retry.
   * @default 'fixed'
   */
  backoff?: 'fixed' | 'exponential';
  /**
   * Upper bound for any delay, `Retry-After` included.
   * @default 30000
   */
  maxDelay?: number;
  /**
   * The HTTP status codes allowed to retry.
   * @default [408, 429, 500, 502, 503, 504]
   */
  statusCodes?: readonly number[];
  /** The HTTP status codes never retried, even when listed in `statusCodes` */
  ignoreStatusCodes?: readonly number[];
  /**
   * Whether transport failures (network errors, timeouts) are retried.
   * @default true
   */
  retryTransportErrors?: boolean;
  /**
   * Whether a `Retry-After` response header replaces the computed delay.
   * @default true
   */
  respectRetryAfter?: boolean;
}

/** Status codes retried by default. */
export const defaultRetryStatusCodes: readonly number[] = Object.freeze([408, 429, 500, 502, 503, 504]);

/**
 * Parses a `Retry-After` value (delay seconds or an HTTP date) into milliseconds from `now`.
 */
export function parseRetryAfter(value: string, now = Date.now()): number | null {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }

  return Math.max(0, date - now);
}

/**
 * Opt-in status and transport retry policy; the client never retries on status alone.
 *
 * The interceptor keeps no state: it decides from `context.retryCount`, so one instance can
 * serve concurrent calls. The client's `maxRetryCount` still caps the total.
 */
export function createRetryInterceptor({
  limit = 2,
  delay = 1000,
  backoff = 'fixed',
  maxDelay = 30_000,
  statusCodes = defaultRetryStatusCodes,
  ignoreStatusCodes = [],
  retryTransportErrors = true,
  respectRetryAfter = true,
}: RetryInterceptorOptions = {}): Interceptor {
  const waitFor = (context: Context, response?: HttpResponse): number => {
    const retryAfter = response && respectRetryAfter ? getHeader(response.headers, 'Retry-After') : null;
    const requested = retryAfter === null ? null : parseRetryAfter(retryAfter);
    const computed = backoff === 'exponential' ? delay * 2 ** context.retryCount : delay;

    return Math.min(requested ?? computed, maxDelay);
  };

  const next = (wait: number) => (wait > 0 ? Evaluation.retryAfter(wait) : Evaluation.retry());

  return {
    handle(_error, context) {
      if (!retryTransportErrors || context.retryCount >= limit) {
        return Evaluation.proceed();
      }

      return next(waitFor(context));
    },
    process(response, context) {
      if (context.retryCount >= limit) {
        return Evaluation.proceed();
      }

      if (ignoreStatusCodes.includes(response.status) || !statusCodes.includes(response.status)) {
        return Evaluation.proceed();
      }

      return next(waitFor(context, response));
    },
  };
}
