/**
 * Bounded Worker Pool
 *
 * Limits how many remote calls are in flight at once. Work beyond the limit
 * waits in a FIFO queue; nothing is rejected, timed out or retried.
 *
 * DESIGN:
 * - One slot per running job
 * - Queued jobs start in submission order as slots free up
 * - A failing job releases its slot like any other
 */

import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'worker-pool' });

export interface WorkerPoolConfig {
  readonly name: string;
  readonly maxConcurrent: number;
}

export interface WorkerPoolStats {
  readonly name: string;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly completedCount: number;
  readonly failedCount: number;
  /** Highest number of jobs observed running at once */
  readonly peakActive: number;
}

interface QueuedJob {
  readonly start: () => void;
}

/**
 * Worker pool
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool({ name: 'portal', maxConcurrent: 8 });
 * const features = await pool.execute(() => connection.generate(csv, parameters));
 * ```
 */
export class WorkerPool {
  private readonly config: WorkerPoolConfig;
  private activeCount = 0;
  private completedCount = 0;
  private failedCount = 0;
  private peakActive = 0;
  private readonly queue: QueuedJob[] = [];

  constructor(config: WorkerPoolConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(`Worker pool '${config.name}' needs maxConcurrent >= 1, got ${config.maxConcurrent}`);
    }
    this.config = config;
  }

  /**
   * Run `fn` once a slot is free
   */
  execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.activeCount++;
        this.peakActive = Math.max(this.peakActive, this.activeCount);

        // Wrapping in a promise chain turns a synchronous throw into a rejection
        void Promise.resolve()
          .then(fn)
          .then(
            (value) => {
              this.completedCount++;
              resolve(value);
            },
            (error: unknown) => {
              this.failedCount++;
              reject(error);
            }
          )
          .finally(() => {
            this.activeCount--;
            this.startNext();
          });
      };

      if (this.activeCount < this.config.maxConcurrent) {
        start();
      } else {
        this.queue.push({ start });
        log.debug('Job queued', { pool: this.config.name, queued: this.queue.length });
      }
    });
  }

  private startNext(): void {
    if (this.activeCount >= this.config.maxConcurrent) {
      return;
    }
    const next = this.queue.shift();
    if (next) {
      next.start();
    }
  }

  getStats(): WorkerPoolStats {
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      completedCount: this.completedCount,
      failedCount: this.failedCount,
      peakActive: this.peakActive,
    };
  }
}

/**
 * Create a worker pool with publisher defaults
 */
export function createWorkerPool(name: string, maxConcurrent = 8): WorkerPool {
  return new WorkerPool({ name, maxConcurrent });
}
