import { describe, it, expect } from 'vitest';
import { CancelledError, DeckMediaError, NotFoundError } from '../errors/index.js';
import { ParallelProcessor } from './parallel-processor.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ParallelProcessor', () => {
  it('keeps input order regardless of completion order', async () => {
    const pool = new ParallelProcessor(async (ms: number) => {
      await delay(ms);
      return ms * 2;
    }, { concurrency: 3 });

    const results = await pool.processAll([30, 10, 20]);

    expect(results.map((r) => r.output)).toEqual([60, 20, 40]);
  });

  it('never runs more than the concurrency limit', async () => {
    let running = 0;
    let peak = 0;
    const pool = new ParallelProcessor(async (n: number) => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
      return n;
    }, { concurrency: 2 });

    await pool.processAll([1, 2, 3, 4, 5]);

    expect(peak).toBe(2);
  });

  it('captures failures per item as typed errors', async () => {
    const pool = new ParallelProcessor(async (n: number) => {
      if (n === 2) throw new NotFoundError('two is missing');
      if (n === 3) throw new Error('plain failure');
      return n;
    });

    const results = await pool.processAll([1, 2, 3]);

    expect(results[0]).toEqual({ input: 1, output: 1 });
    expect(results[1].error).toBeInstanceOf(NotFoundError);
    expect(results[2].error).toBeInstanceOf(DeckMediaError);
    expect(results[2].error?.code).toBe('UNKNOWN_ERROR');
    expect(results[2].error?.message).toBe('plain failure');
  });

  it('passes the item index and signal to the handler', async () => {
    const controller = new AbortController();
    const seen: Array<[string, number, boolean]> = [];
    const pool = new ParallelProcessor(async (item: string, index: number, signal?: AbortSignal) => {
      seen.push([item, index, signal === controller.signal]);
      return item;
    }, { concurrency: 1 });

    await pool.processAll(['a', 'b'], controller.signal);

    expect(seen).toEqual([['a', 0, true], ['b', 1, true]]);
  });

  it('does not start queued items after cancellation', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const pool = new ParallelProcessor(async (n: number) => {
      started.push(n);
      if (n === 1) controller.abort();
      return n;
    }, { concurrency: 1 });

    const results = await pool.processAll([1, 2, 3], controller.signal);

    expect(started).toEqual([1]);
    expect(results[0].output).toBe(1);
    expect(results[1].error).toBeInstanceOf(CancelledError);
    expect(results[2].error).toBeInstanceOf(CancelledError);
  });

  it('returns an empty list for no input', async () => {
    const pool = new ParallelProcessor(async (n: number) => n);
    await expect(pool.processAll([])).resolves.toEqual([]);
  });
});
