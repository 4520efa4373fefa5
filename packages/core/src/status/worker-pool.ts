/**
 * Worker Pool - Bounded parallel resolution with fail-fast cancellation
 *
 * Items are dispatched in input order to at most `maxWorkers` concurrent
 * tasks. Every task receives the run's signal. The first failure stops
 * dispatch and aborts that signal, so tasks already running stop at their
 * next collaborator call; they are awaited and their results discarded.
 * When several tasks fail, the failure of the item earliest in input order
 * is reported, so the error a caller sees does not depend on scheduling.
 * Cancellations caused by the run's own abort never count as failures.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool<Machine, MachineStatus>({ maxWorkers: 4 });
 * const statuses = await pool.run(machines, (m, _index, signal) =>
 *   resolveMachineStatus(m, { ...ctx, signal })
 * );
 * ```
 */

import { EventEmitter } from 'node:events';

import { StatusCancelledError, toError } from './errors.js';

/**
 * Options for configuring the worker pool
 */
export interface WorkerPoolOptions {
  /**
   * Maximum number of concurrent tasks
   * @default 8
   */
  maxWorkers?: number | undefined;

  /** Stops dispatching new tasks once aborted */
  signal?: AbortSignal | undefined;
}

/**
 * Type for the task processor function
 */
export type TaskProcessor<TInput, TOutput> = (
  input: TInput,
  index: number,
  signal: AbortSignal
) => Promise<TOutput>;

/**
 * Statistics about the last run
 */
export interface WorkerPoolStats {
  dispatchedTasks: number;
  completedTasks: number;
  failedTasks: number;
  /** Highest number of tasks observed running at once */
  peakConcurrency: number;
}

/**
 * Events emitted by the worker pool
 */
export interface WorkerPoolEvents<TInput, TOutput> {
  taskCompleted: (input: TInput, output: TOutput, index: number) => void;
  taskFailed: (input: TInput, error: Error, index: number) => void;
}

export const DEFAULT_MAX_WORKERS = 8;

export class WorkerPool<TInput, TOutput> extends EventEmitter {
  private readonly maxWorkers: number;
  private readonly signal: AbortSignal | undefined;
  private stats: WorkerPoolStats = emptyStats();

  constructor(options: WorkerPoolOptions = {}) {
    super();
    const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
    this.signal = options.signal;
  }

  override on<K extends keyof WorkerPoolEvents<TInput, TOutput>>(
    event: K,
    listener: WorkerPoolEvents<TInput, TOutput>[K]
  ): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof WorkerPoolEvents<TInput, TOutput>>(
    event: K,
    ...args: Parameters<WorkerPoolEvents<TInput, TOutput>[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Process every input, returning outputs in input order
   */
  async run(
    inputs: readonly TInput[],
    processor: TaskProcessor<TInput, TOutput>
  ): Promise<TOutput[]> {
    this.stats = emptyStats();
    const outputs = new Array<TOutput>(inputs.length);
    const queue = inputs.entries();
    const state: RunState = { running: 0, cancelled: false };

    const run = new AbortController();
    const cancelRun = (): void => run.abort();
    if (this.signal?.aborted) {
      run.abort();
    } else {
      this.signal?.addEventListener('abort', cancelRun, { once: true });
    }

    const worker = async (): Promise<void> => {
      for (let item = queue.next(); !item.done; item = queue.next()) {
        if (state.firstFailure !== undefined) {
          return;
        }
        if (run.signal.aborted) {
          state.cancelled = true;
          return;
        }
        const [index, input] = item.value;
        this.stats.dispatchedTasks++;
        state.running++;
        this.stats.peakConcurrency = Math.max(this.stats.peakConcurrency, state.running);
        try {
          const output = await processor(input, index, run.signal);
          outputs[index] = output;
          this.stats.completedTasks++;
          this.emit('taskCompleted', input, output, index);
        } catch (error) {
          const failure = toError(error);
          if (failure instanceof StatusCancelledError) {
            state.cancelled = true;
          } else if (state.firstFailure === undefined || index < state.firstFailure.index) {
            state.firstFailure = { index, error: failure };
            run.abort();
          }
          this.stats.failedTasks++;
          this.emit('taskFailed', input, failure, index);
        } finally {
          state.running--;
        }
      }
    };

    const workerCount = Math.min(this.maxWorkers, inputs.length);
    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      this.signal?.removeEventListener('abort', cancelRun);
    }

    if (state.firstFailure !== undefined) {
      throw state.firstFailure.error;
    }
    if (state.cancelled) {
      throw new StatusCancelledError();
    }
    return outputs;
  }

  getStats(): WorkerPoolStats {
    return { ...this.stats };
  }
}

interface RunState {
  running: number;
  cancelled: boolean;
  /** Failure of the earliest input seen so far */
  firstFailure?: { index: number; error: Error };
}

function emptyStats(): WorkerPoolStats {
  return { dispatchedTasks: 0, completedTasks: 0, failedTasks: 0, peakConcurrency: 0 };
}
