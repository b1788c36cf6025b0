import { describe, it, expect } from 'vitest';
import { CancelledError } from '../errors/index.js';
import { ConcurrencyLimiter } from './concurrency-limiter.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('ConcurrencyLimiter', () => {
  it('holds tasks beyond the limit until a slot frees', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, i) => limiter.run(async () => {
      started.push(i);
      await gate.promise;
      return i;
    }));
    await tick();

    expect(started).toEqual([0, 1]);
    expect(limiter.inFlight).toBe(2);

    gates[0].resolve();
    await runs[0];
    await tick();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    expect(limiter.inFlight).toBe(0);
  });

  it('is shared by independent callers', async () => {
    const limiter = new ConcurrencyLimiter(1);
    let running = 0;
    let peak = 0;
    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running--;
    };

    await Promise.all([
      Promise.all([limiter.run(task), limiter.run(task)]),
      Promise.all([limiter.run(task), limiter.run(task)]),
    ]);

    expect(peak).toBe(1);
  });

  it('releases the slot when a task fails', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('drops a waiter whose signal aborts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    const controller = new AbortController();
    let ran = false;

    const first = limiter.run(() => gate.promise);
    const second = limiter.run(async () => { ran = true; }, controller.signal);
    controller.abort();

    await expect(second).rejects.toBeInstanceOf(CancelledError);
    gate.resolve();
    await first;
    expect(ran).toBe(false);
    expect(limiter.inFlight).toBe(0);
  });

  it('rejects at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new ConcurrencyLimiter(1).run(async () => 1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
