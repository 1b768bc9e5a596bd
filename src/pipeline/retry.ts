import type { HttpFailure } from '../error/failure.js';
import { MaxRetryCountReachedError } from '../error/maxRetryCountReachedError.js';
import type { HttpResponse } from '../types/request.js';
import { sleep } from '../utils/sleep.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { type AttemptOptions, canceled, runAttempt } from './attempt.js';
import { type Context, nextAttempt } from './context.js';

/** Options for {@link runPipeline} */
export interface PipelineOptions extends AttemptOptions {
  /** Retries allowed after the first attempt */
  maxRetryCount: number;
}

/**
 * Runs attempts until one succeeds or fails for good.
 *
 * Retries happen only when an interceptor asks for one. Each retry re-runs the whole pipeline
 * with `retryCount` one higher, after the requested delay. Asking for a retry once
 * `retryCount` reached `maxRetryCount` fails with a {@link MaxRetryCountReachedError},
 * so a call makes at most `maxRetryCount + 1` attempts.
 */
export async function runPipeline(
  initial: Context,
  { maxRetryCount, ...options }: PipelineOptions,
): SafeWrapAsync<HttpFailure, HttpResponse> {
  const { logger } = options;
  const { signal } = initial;

  for (let context = initial; ; context = nextAttempt(context)) {
    const outcome = await runAttempt(context, options);
    if (outcome.type === 'success') {
      return [null, outcome.response];
    }

    if (outcome.type === 'failure') {
      return [outcome.error, null];
    }

    const attempts = context.retryCount + 1;
    if (context.retryCount >= maxRetryCount) {
      logger.debug({ retryCount: context.retryCount, maxRetryCount }, 'retry budget exhausted');
      return [new MaxRetryCountReachedError(`error max retry count ${maxRetryCount} reached`, attempts), null];
    }

    const { delay } = outcome;
    logger.debug({ retryCount: context.retryCount, delay }, 'retrying request');
    if (delay > 0) {
      const [err] = await safeWrapAsync(() => sleep(delay, signal));
      if (err) {
        return [canceled(signal), null];
      }
    }

    if (signal.aborted) {
      return [canceled(signal), null];
    }
  }
}
