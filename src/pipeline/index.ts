/**
 * Pipeline entrypoint: the interceptor, observer and context contracts plus the pass and retry runners.
 * @module
 */
export { type AttemptOptions, type AttemptOutcome, runAttempt } from './attempt.js';
export { classifyResponse } from './classify.js';
export { type Context, createContext, nextAttempt, type Tags } from './context.js';
export { Evaluation, retryDelay } from './evaluation.js';
export type { Awaitable, Interceptor } from './interceptor.js';
export { notifyObservers, type Observer, type ObserverEvent } from './observer.js';
export { type PipelineOptions, runPipeline } from './retry.js';
