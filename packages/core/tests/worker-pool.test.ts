/**
 * Worker Pool Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { WorkerPool } from '../src/status/worker-pool.js';
import { StatusCancelledError } from '../src/status/errors.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WorkerPool', () => {
  it('returns outputs in input order', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 3 });

    // Later inputs finish first
    const outputs = await pool.run([30, 20, 10, 0], async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(outputs).toEqual([60, 40, 20, 0]);
  });

  it('never runs more than maxWorkers tasks at once', async () => {
    const pool = new WorkerPool<number, void>({ maxWorkers: 2 });

    await pool.run([1, 2, 3, 4, 5, 6], async () => {
      await delay(5);
    });

    const stats = pool.getStats();
    expect(stats.peakConcurrency).toBe(2);
    expect(stats.completedTasks).toBe(6);
  });

  it('handles an empty input', async () => {
    const pool = new WorkerPool<number, number>();
    await expect(pool.run([], async (n) => n)).resolves.toEqual([]);
  });

  it('stops dispatching after the first failure', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 1 });
    const processor = vi.fn(async (n: number) => {
      if (n === 1) {
        throw new Error('boom');
      }
      return n;
    });

    await expect(pool.run([0, 1, 2, 3], processor)).rejects.toThrow('boom');
    expect(processor).toHaveBeenCalledTimes(2);
    expect(pool.getStats().dispatchedTasks).toBe(2);
  });

  it('reports the failure of the earliest input regardless of timing', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 4 });

    // Input 1 fails last, input 3 fails first
    const run = pool.run([0, 1, 2, 3], async (n) => {
      if (n === 1) {
        await delay(30);
        throw new Error('failure of 1');
      }
      if (n === 3) {
        throw new Error('failure of 3');
      }
      return n;
    });

    await expect(run).rejects.toThrow('failure of 1');
  });

  it('emits taskCompleted and taskFailed events', async () => {
    const pool = new WorkerPool<string, string>({ maxWorkers: 1 });
    const completed = vi.fn();
    const failed = vi.fn();
    pool.on('taskCompleted', completed);
    pool.on('taskFailed', failed);

    await expect(
      pool.run(['a', 'b'], async (s) => {
        if (s === 'b') {
          throw new Error('bad b');
        }
        return s.toUpperCase();
      })
    ).rejects.toThrow('bad b');

    expect(completed).toHaveBeenCalledWith('a', 'A', 0);
    expect(failed).toHaveBeenCalledWith('b', new Error('bad b'), 1);
  });

  it('stops dispatching once the signal is aborted', async () => {
    const controller = new AbortController();
    const pool = new WorkerPool<number, number>({ maxWorkers: 1, signal: controller.signal });
    const processor = vi.fn(async (n: number) => {
      controller.abort();
      return n;
    });

    await expect(pool.run([0, 1, 2], processor)).rejects.toBeInstanceOf(StatusCancelledError);
    expect(processor).toHaveBeenCalledTimes(1);
  });

  it('aborts the signal of running tasks after the first failure', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 2 });
    const seen: boolean[] = [];

    const run = pool.run([0, 1], async (n, _index, signal) => {
      if (n === 0) {
        await delay(5);
        throw new Error('boom');
      }
      await delay(30);
      seen.push(signal.aborted);
      return n;
    });

    await expect(run).rejects.toThrow('boom');
    expect(seen).toEqual([true]);
  });

  it('reports a real failure over the cancellations it caused', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 2 });

    // Input 0 stops with a cancellation once input 1 has failed
    const run = pool.run([0, 1], async (n, _index, signal) => {
      if (n === 1) {
        throw new Error('failure of 1');
      }
      await delay(20);
      if (signal.aborted) {
        throw new StatusCancelledError();
      }
      return n;
    });

    await expect(run).rejects.toThrow('failure of 1');
  });

  it('passes an external abort on to running tasks', async () => {
    const controller = new AbortController();
    const pool = new WorkerPool<number, boolean>({ maxWorkers: 1, signal: controller.signal });
    const seen: boolean[] = [];

    const run = pool.run([0, 1], async (_n, _index, signal) => {
      controller.abort();
      seen.push(signal.aborted);
      return signal.aborted;
    });

    await expect(run).rejects.toBeInstanceOf(StatusCancelledError);
    expect(seen).toEqual([true]);
  });

  it('rejects a non-positive worker bound', () => {
    expect(() => new WorkerPool({ maxWorkers: 0 })).toThrow(
      'maxWorkers must be a positive integer, got 0'
    );
  });
});
