/**
 * Remote call policy tests
 */

import { describe, it, expect, vi } from 'vitest';
import { CancelledError, NotFoundError, TransientError } from '../errors/index.js';
import { backoffDelay, RetryingRemoteSource, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type { RemoteSource } from './types.js';

const FAST: RetryPolicy = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 1000 };

describe('backoffDelay', () => {
  const policy: RetryPolicy = { attempts: 5, baseDelayMs: 100, maxDelayMs: 1000, timeoutMs: 1000 };

  it('doubles per retry', () => {
    expect(backoffDelay(policy, 1)).toBe(100);
    expect(backoffDelay(policy, 2)).toBe(200);
    expect(backoffDelay(policy, 3)).toBe(400);
  });

  it('is capped by maxDelayMs', () => {
    expect(backoffDelay(policy, 10)).toBe(1000);
  });

  it('honours a longer retry-after hint up to the cap', () => {
    expect(backoffDelay(policy, 1, 700)).toBe(700);
    expect(backoffDelay(policy, 1, 5000)).toBe(1000);
  });
});

describe('withRetry', () => {
  it('retries transient failures until success', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransientError('flaky'))
      .mockRejectedValueOnce(new TransientError('flaky'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, FAST)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last transient error after the final attempt', async () => {
    const fn = vi.fn().mockRejectedValue(new TransientError('down'));
    await expect(withRetry(fn, FAST)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry permanent errors', async () => {
    const fn = vi.fn().mockRejectedValue(new NotFoundError('gone'));
    await expect(withRetry(fn, FAST)).rejects.toBeInstanceOf(NotFoundError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('turns a slow attempt into a TransientError and aborts its signal', async () => {
    let seen: AbortSignal | undefined;
    const fn = (signal: AbortSignal): Promise<string> => {
      seen = signal;
      return new Promise<string>(() => undefined);
    };
    await expect(withRetry(fn, { ...FAST, attempts: 1, timeoutMs: 10 })).rejects.toThrow('Remote call timed out after 10ms');
    expect(seen?.aborted).toBe(true);
  });

  it('throws CancelledError without calling when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, FAST, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('cancels an in-flight attempt when the outer signal aborts', async () => {
    const controller = new AbortController();
    const pending = withRetry(() => new Promise<string>(() => undefined), FAST, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('RetryingRemoteSource', () => {
  it('retries each method through the policy', async () => {
    const inner: RemoteSource = {
      listContainer: vi.fn()
        .mockRejectedValueOnce(new TransientError('busy'))
        .mockResolvedValue({ containers: [], presentations: [] }),
      describePresentation: vi.fn().mockResolvedValue({ id: 'P1', name: 'Deck', slideIds: ['s1'], metadata: {} }),
      fetchSlideVector: vi.fn(),
    };
    const remote = new RetryingRemoteSource(inner, FAST);

    await expect(remote.listContainer('root')).resolves.toEqual({ containers: [], presentations: [] });
    expect(inner.listContainer).toHaveBeenCalledTimes(2);
    await expect(remote.describePresentation('P1')).resolves.toEqual({ id: 'P1', name: 'Deck', slideIds: ['s1'], metadata: {} });
  });
});
