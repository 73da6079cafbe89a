import { setTimeout as sleep } from 'node:timers/promises';
import { ProviderError } from '../errors.js';

export interface RetryPolicy {
  /** Retries after the first attempt. */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/** Delay before retry number `retry` (1-based): base·2^(retry−1), capped. */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (retry - 1));
}

export function isRetryable(err: unknown): boolean {
  return err instanceof ProviderError;
}

/**
 * Run `attempt` until it succeeds, a non-retryable error surfaces, or the
 * policy is exhausted. The backoff sleep rejects as soon as `signal` aborts.
 */
export async function withRetry<T>(
  attempt: (n: number) => Promise<T>,
  policy: RetryPolicy,
  signal: AbortSignal,
  opts: { retryable?: (err: unknown) => boolean; onRetry?: (n: number, err: unknown, delayMs: number) => void } = {},
): Promise<T> {
  const retryable = opts.retryable ?? isRetryable;
  for (let n = 1; ; n++) {
    try {
      return await attempt(n);
    } catch (err) {
      if (n > policy.maxRetries || signal.aborted || !retryable(err)) throw err;
      const delayMs = backoffDelay(policy, n);
      opts.onRetry?.(n, err, delayMs);
      await sleep(delayMs, undefined, { signal });
    }
  }
}

/**
 * A per-call abort scope: aborts when the parent aborts or the timeout
 * elapses, whichever comes first. Always call `dispose()`.
 */
export interface CallScope {
  readonly signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

export function openCallScope(parent: AbortSignal, timeoutMs: number): CallScope {
  const controller = new AbortController();
  let timedOut = false;
  const onParentAbort = () => controller.abort(parent.reason);

  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`timed out after ${timeoutMs} ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with `work`, or reject with the abort reason as soon as `signal`
 * aborts, whether or not `work` honours the signal itself.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    // Settling twice is a no-op, so a late result after abort is dropped here.
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
