/**
 * @fileoverview In-process background task runner
 *
 * Slow or failure-prone work (AI session mirroring, operator media
 * delivery, status updates that arrive before their message row) runs here,
 * off the request path, with a concurrency limit and retries.
 *
 * @module services/task-runner
 * @license MIT
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

export type TaskOptions = Pick<RetryOptions, 'retries' | 'baseDelayMs' | 'maxDelayMs' | 'isRetryable'>;

export interface EnqueueOptions extends TaskOptions {
  /** Tasks sharing a key run one at a time, in the order they were queued. */
  key?: string;
}

export interface TaskRunnerOptions {
  concurrency?: number;
  /** Applied to every task unless the task overrides it. */
  defaults?: TaskOptions;
  logger?: Logger;
}

interface QueuedTask {
  id: string;
  name: string;
  fn: () => unknown;
  key: string | undefined;
  options: TaskOptions;
}

/**
 * TaskRunner executes fire-and-forget work with retries.
 *
 * @description
 * Failures after the last retry are logged and dropped; they never reach
 * the code that enqueued the task.
 *
 * @example
 * const runner = new TaskRunner({ concurrency: 4 });
 * runner.enqueue('mirror-takeover', () => sessions.setOperatorActive(phone, true), { retries: 3, key: phone });
 * await runner.onIdle();
 */
export class TaskRunner {
  private readonly queue: QueuedTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly runningKeys = new Set<string>();
  private active = 0;
  private closed = false;
  private readonly concurrency: number;
  private readonly defaults: TaskOptions;
  private readonly logger: Logger;

  constructor(options: TaskRunnerOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.defaults = options.defaults ?? { retries: 3, baseDelayMs: 500, maxDelayMs: 10_000 };
    this.logger = options.logger ?? createLogger('tasks');
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this.queue.length + this.active;
  }

  /**
   * Queue a task.
   *
   * @returns The task id used in log lines
   * @throws {Error} After {@link close}
   */
  enqueue(name: string, fn: () => unknown, options: EnqueueOptions = {}): string {
    if (this.closed) {
      throw new Error(`Task runner is closed; rejected ${name}`);
    }
    const id = uuidv4();
    const { key, ...retry } = options;
    this.queue.push({ id, name, fn, key, options: { ...this.defaults, ...retry } });
    this.logger.debug(`Queued ${name} (${id.slice(0, 8)})`);
    this.pump();
    return id;
  }

  /**
   * Resolves once nothing is queued or running.
   */
  onIdle(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting tasks and wait for the queued ones.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const index = this.queue.findIndex((queued) => queued.key === undefined || !this.runningKeys.has(queued.key));
      if (index < 0) break;
      const [task] = this.queue.splice(index, 1);
      const key = task.key;
      if (key !== undefined) this.runningKeys.add(key);
      this.active++;
      void this.run(task).finally(() => {
        if (key !== undefined) this.runningKeys.delete(key);
        this.active--;
        this.pump();
        if (this.pending === 0) {
          this.idleWaiters.splice(0).forEach((resolve) => resolve());
        }
      });
    }
  }

  private async run(task: QueuedTask): Promise<void> {
    const label = `${task.name} (${task.id.slice(0, 8)})`;
    try {
      await withRetry(async () => task.fn(), {
        ...task.options,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(`${label} failed (attempt ${attempt}): ${errorMessage(error)}; retrying in ${delayMs}ms`);
        },
      });
      this.logger.debug(`${label} completed`);
    } catch (error) {
      this.logger.error(`${label} failed permanently:`, error);
    }
  }
}
