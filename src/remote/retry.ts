/**
 * Remote call policy: per-attempt timeout plus bounded exponential backoff.
 *
 * Only TransientError is retried. A timed-out attempt is abandoned (its
 * signal is aborted) and counts as a TransientError.
 */

import { CancelledError, TransientError } from '../errors/index.js';
import type { VectorDocument } from '../model/vector-document.js';
import type { ContainerListing, PresentationDescription, RemoteSource } from './types.js';

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  attempts: number;
  /** Delay before the first retry in ms; doubles per retry (default: 250) */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay in ms (default: 4000) */
  maxDelayMs: number;
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4000,
  timeoutMs: 30000,
};

export function backoffDelay(policy: RetryPolicy, retry: number, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (retry - 1);
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function attemptWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
    };
    const onOuterAbort = (): void => {
      cleanup();
      controller.abort();
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new TransientError(`Remote call timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    if (outer?.aborted) {
      onOuterAbort();
      return;
    }
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    fn(controller.signal).then(
      (result) => {
        cleanup();
        resolve(result);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

/**
 * Run a remote call under the policy. Non-transient errors are rethrown
 * immediately; transient ones are rethrown after the last attempt.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  signal?: AbortSignal
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    try {
      return await attemptWithTimeout(fn, policy.timeoutMs, signal);
    } catch (err) {
      if (!(err instanceof TransientError) || attempt >= attempts) {
        throw err;
      }
      await sleep(backoffDelay(policy, attempt, err.retryAfterMs), signal);
    }
  }
}

/**
 * Decorate a RemoteSource so that every call goes through withRetry.
 */
export class RetryingRemoteSource implements RemoteSource {
  constructor(
    private readonly inner: RemoteSource,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY
  ) {}

  listContainer(containerId: string, signal?: AbortSignal): Promise<ContainerListing> {
    return withRetry((s) => this.inner.listContainer(containerId, s), this.policy, signal);
  }

  describePresentation(presentationId: string, signal?: AbortSignal): Promise<PresentationDescription> {
    return withRetry((s) => this.inner.describePresentation(presentationId, s), this.policy, signal);
  }

  fetchSlideVector(presentationId: string, slideId: string, signal?: AbortSignal): Promise<VectorDocument> {
    return withRetry((s) => this.inner.fetchSlideVector(presentationId, slideId, s), this.policy, signal);
  }
}
