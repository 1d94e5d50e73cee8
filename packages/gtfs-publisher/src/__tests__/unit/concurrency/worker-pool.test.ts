/**
 * Worker pool tests
 */

import { describe, it, expect } from 'vitest';
import { WorkerPool, createWorkerPool } from '../../../concurrency/worker-pool.js';

interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('WorkerPool', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new WorkerPool({ name: 'bad', maxConcurrent: 0 })).toThrow(RangeError);
    expect(() => new WorkerPool({ name: 'bad', maxConcurrent: 1.5 })).toThrow(RangeError);
  });

  it('never runs more than maxConcurrent jobs and starts queued jobs in order', async () => {
    const pool = new WorkerPool({ name: 'test', maxConcurrent: 2 });
    const gates = [0, 1, 2, 3, 4].map(() => deferred<number>());
    const started: number[] = [];

    const results = gates.map((gate, i) =>
      pool.execute(() => {
        started.push(i);
        return gate.promise;
      })
    );

    await flush();
    expect(started).toEqual([0, 1]);
    expect(pool.getStats()).toMatchObject({ activeCount: 2, queuedCount: 3 });

    gates[1]?.resolve(1);
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[0]?.resolve(0);
    gates[2]?.resolve(2);
    await flush();
    expect(started).toEqual([0, 1, 2, 3, 4]);

    gates[3]?.resolve(3);
    gates[4]?.resolve(4);
    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2, 3, 4]);

    expect(pool.getStats()).toEqual({
      name: 'test',
      activeCount: 0,
      queuedCount: 0,
      completedCount: 5,
      failedCount: 0,
      peakActive: 2,
    });
  });

  it('frees the slot of a failed job', async () => {
    const pool = new WorkerPool({ name: 'test', maxConcurrent: 1 });

    const failing = pool.execute(() => Promise.reject(new Error('remote down')));
    const next = pool.execute(() => Promise.resolve('ok'));

    await expect(failing).rejects.toThrow('remote down');
    await expect(next).resolves.toBe('ok');
    expect(pool.getStats()).toMatchObject({ completedCount: 1, failedCount: 1, activeCount: 0 });
  });

  it('turns a synchronous throw into a rejection', async () => {
    const pool = createWorkerPool('sync');
    await expect(
      pool.execute((): Promise<void> => {
        throw new Error('thrown');
      })
    ).rejects.toThrow('thrown');
    expect(pool.getStats().failedCount).toBe(1);
  });
});
