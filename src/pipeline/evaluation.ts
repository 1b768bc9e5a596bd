import type { HttpResponse } from '../types/request.js';

/**
 * An interceptor's verdict on a response or a transport failure.
 *
 * - `proceed`: accept the outcome, optionally replacing the response.
 * - `retry`: run the whole pipeline again right away.
 * - `retryAfter`: run it again after `delay` milliseconds.
 */
export type Evaluation =
  | { readonly type: 'proceed'; readonly response: HttpResponse | null }
  | { readonly type: 'retry' }
  | { readonly type: 'retryAfter'; readonly delay: number };

/** Evaluation factories. */
export const Evaluation = {
  /** Accept the outcome; a given `response` replaces the current one for the remaining interceptors. */
  proceed(response: HttpResponse | null = null): Evaluation {
    return { type: 'proceed', response };
  },
  /** Retry immediately. */
  retry(): Evaluation {
    return { type: 'retry' };
  },
  /** Retry after `delay` milliseconds; negative delays count as zero. */
  retryAfter(delay: number): Evaluation {
    return { type: 'retryAfter', delay: Math.max(0, delay) };
  },
};

/** Milliseconds to wait before the next attempt, or `null` when the evaluation proceeds. */
export function retryDelay(evaluation: Evaluation): number | null {
  switch (evaluation.type) {
    case 'proceed':
      return null;
    case 'retry':
      return 0;
    case 'retryAfter':
      return evaluation.delay;
  }
}
