/**
 * Parallel Processor
 *
 * Concurrency-capped task pool. Results keep input order regardless of
 * completion order; individual failures are captured, never thrown. Once
 * the signal aborts, tasks that have not started are recorded as
 * CancelledError without running.
 */

import { CancelledError, ErrorHandler } from '../errors/index.js';
import type { DeckMediaError } from '../errors/index.js';

export interface ProcessorOptions {
  /** Maximum parallel tasks (default: 3) */
  concurrency?: number;
}

export interface ProcessorResult<TInput, TOutput> {
  input: TInput;
  output?: TOutput;
  error?: DeckMediaError;
}

export type TaskHandler<TInput, TOutput> = (
  item: TInput,
  index: number,
  signal?: AbortSignal
) => Promise<TOutput>;

export class ParallelProcessor<TInput, TOutput> {
  private readonly concurrency: number;

  constructor(
    private handler: TaskHandler<TInput, TOutput>,
    options: ProcessorOptions = {}
  ) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 3));
  }

  /**
   * Process all items with the configured concurrency limit.
   */
  async processAll(
    items: readonly TInput[],
    signal?: AbortSignal
  ): Promise<Array<ProcessorResult<TInput, TOutput>>> {
    const results: Array<ProcessorResult<TInput, TOutput>> = new Array(items.length);
    const queue = items.map((input, index) => ({ input, index }));

    const runWorker = async (): Promise<void> => {
      while (queue.length > 0) {
        const task = queue.shift();
        if (!task) break;
        results[task.index] = await this.runOne(task.input, task.index, signal);
      }
    };

    const workerCount = Math.min(this.concurrency, items.length);
    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      workers.push(runWorker());
    }
    await Promise.all(workers);

    return results;
  }

  private async runOne(
    input: TInput,
    index: number,
    signal?: AbortSignal
  ): Promise<ProcessorResult<TInput, TOutput>> {
    if (signal?.aborted) {
      return { input, error: new CancelledError() };
    }
    try {
      const output = await this.handler(input, index, signal);
      return { input, output };
    } catch (err) {
      return { input, error: ErrorHandler.normalize(err) };
    }
  }
}
