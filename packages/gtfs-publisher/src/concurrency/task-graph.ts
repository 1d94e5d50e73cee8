/**
 * Dependency-Ordered Task Graph
 *
 * Declares units of work with explicit dependencies and runs them with as
 * much parallelism as the dependencies allow.
 *
 * Semantics:
 * - A task starts only when every dependency has succeeded
 * - A failed dependency fails its dependents without running them
 * - Running tasks are never cancelled; unrelated branches carry on
 * - `run()` resolves once every task is terminal, it never rejects
 *
 * Dependencies are task handles, so a graph is acyclic by construction:
 * a task can only depend on tasks declared before it.
 */

import { DependencyFailedError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'task-graph' });

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed';

/**
 * Read-only view of a task after the graph has run
 */
export interface PublishTask {
  readonly id: string;
  readonly dependencies: readonly string[];
  readonly state: TaskState;
  readonly result?: unknown;
  readonly failureReason?: string;
}

export interface TaskGraphResult {
  /** Every task, in declaration order */
  readonly tasks: readonly PublishTask[];
  /** Ids of succeeded tasks, in resolution order */
  readonly succeededTasks: readonly string[];
  /**
   * One `<task id>: <reason>` entry per task that ran and failed, in
   * resolution order. Tasks skipped for a failed dependency are not listed.
   */
  readonly failures: readonly string[];
}

/**
 * A declared task. Dependents read its output through `result`.
 */
export class TaskHandle<T> {
  private taskState: TaskState = 'pending';
  private output?: { readonly value: T };
  private failure?: Error;

  constructor(
    readonly id: string,
    readonly dependencies: readonly TaskHandle<unknown>[],
    private readonly work: () => Promise<T>
  ) {}

  get state(): TaskState {
    return this.taskState;
  }

  /**
   * Output of a succeeded task
   *
   * @throws Error when the task has not succeeded
   */
  get result(): T {
    if (this.output === undefined) {
      throw new Error(`Task '${this.id}' has no result (state: ${this.taskState})`);
    }
    return this.output.value;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  /** @internal */
  async execute(): Promise<void> {
    this.taskState = 'running';
    try {
      const value = await this.work();
      this.output = { value };
      this.taskState = 'succeeded';
    } catch (error) {
      this.failure = toError(error);
      this.taskState = 'failed';
    }
  }

  /** @internal */
  skip(error: Error): void {
    this.failure = error;
    this.taskState = 'failed';
  }

  snapshot(): PublishTask {
    return {
      id: this.id,
      dependencies: this.dependencies.map((dependency) => dependency.id),
      state: this.taskState,
      result: this.output?.value,
      failureReason: this.failure?.message,
    };
  }
}

export class TaskGraph {
  private readonly tasks: TaskHandle<unknown>[] = [];
  private readonly ids = new Set<string>();
  private readonly settling = new Map<TaskHandle<unknown>, Promise<void>>();
  private readonly resolutionOrder: TaskHandle<unknown>[] = [];
  private started = false;

  /**
   * Declare a task
   *
   * @param id - Unique task id, used in logs and reports
   * @param dependencies - Tasks that must succeed first
   * @param work - The task body; dependency outputs are read from their handles
   */
  add<T>(id: string, dependencies: readonly TaskHandle<unknown>[], work: () => Promise<T>): TaskHandle<T> {
    if (this.started) {
      throw new Error(`Cannot add task '${id}' to a graph that is already running`);
    }
    if (this.ids.has(id)) {
      throw new Error(`Duplicate task id '${id}'`);
    }
    for (const dependency of dependencies) {
      if (!this.tasks.includes(dependency)) {
        throw new Error(`Task '${id}' depends on '${dependency.id}', which belongs to another graph`);
      }
    }

    const task = new TaskHandle(id, dependencies, work);
    this.ids.add(id);
    this.tasks.push(task);
    return task;
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Run every task and wait until all of them are terminal
   */
  async run(): Promise<TaskGraphResult> {
    if (this.started) {
      throw new Error('Task graph has already been run');
    }
    this.started = true;

    await Promise.all(this.tasks.map((task) => this.settle(task)));

    const failures: string[] = [];
    for (const task of this.resolutionOrder) {
      const error = task.error;
      if (error === undefined || error instanceof DependencyFailedError) {
        continue;
      }
      failures.push(`${task.id}: ${error.message}`);
    }

    return {
      tasks: this.tasks.map((task) => task.snapshot()),
      succeededTasks: this.resolutionOrder.filter((task) => task.state === 'succeeded').map((task) => task.id),
      failures,
    };
  }

  private settle(task: TaskHandle<unknown>): Promise<void> {
    const existing = this.settling.get(task);
    if (existing) {
      return existing;
    }

    const settled = this.waitForDependencies(task).then(async (failedDependency) => {
      if (failedDependency) {
        const upstream = failedDependency.error ?? new Error(`Task '${failedDependency.id}' failed`);
        const rootCause = upstream instanceof DependencyFailedError ? upstream.rootCause : upstream;
        task.skip(new DependencyFailedError(task.id, failedDependency.id, rootCause));
        log.warn('Task skipped, dependency failed', { task: task.id, dependency: failedDependency.id });
      } else {
        log.info('Task started', { task: task.id });
        await task.execute();
        if (task.state === 'succeeded') {
          log.info('Task succeeded', { task: task.id });
        } else {
          log.error('Task failed', { task: task.id, error: task.error?.message });
        }
      }
      this.resolutionOrder.push(task);
    });

    this.settling.set(task, settled);
    return settled;
  }

  /**
   * Resolve with the first dependency to fail, or undefined once all succeed
   */
  private waitForDependencies(task: TaskHandle<unknown>): Promise<TaskHandle<unknown> | undefined> {
    if (task.dependencies.length === 0) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      let remaining = task.dependencies.length;
      for (const dependency of task.dependencies) {
        void this.settle(dependency).then(() => {
          if (dependency.state === 'failed') {
            resolve(dependency);
            return;
          }
          remaining--;
          if (remaining === 0) {
            resolve(undefined);
          }
        });
      }
    });
  }
}
