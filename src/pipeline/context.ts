import type { CodecRegistry } from '../codec/registry.js';
import type { HttpRequest } from '../types/request.js';

/** Free-form labels attached to a call, visible to every interceptor and observer. */
export type Tags = Readonly<Record<string, string>>;

/**
 * Per-call pipeline state. A fresh context is created for every call and replaced,
 * never mutated, for every retry.
 */
export interface Context {
  /** Request as built for the call, before any `prepare` step */
  readonly request: HttpRequest;
  readonly tags: Tags;
  /** Retries made so far; 0 on the first attempt */
  readonly retryCount: number;
  /** Aborts when the call is canceled */
  readonly signal: AbortSignal;
  /** Codecs in use for the call */
  readonly codecs: CodecRegistry;
}

/** Builds the context of a call's first attempt. */
export function createContext({ request, tags = {}, signal, codecs }: Omit<Context, 'retryCount' | 'tags'> & {
  tags?: Tags;
}): Context {
  return Object.freeze({ request, tags: Object.freeze({ ...tags }), retryCount: 0, signal, codecs });
}

/** Context of the attempt following `context`. */
export function nextAttempt(context: Context): Context {
  return Object.freeze({ ...context, retryCount: context.retryCount + 1 });
}
