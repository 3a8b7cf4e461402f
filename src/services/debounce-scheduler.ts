/**
 * @fileoverview Timers that turn buffered batches into dispatches
 *
 * A check is scheduled when a message opens a new batch. Each check asks
 * the buffer store for a decision: a `waiting` batch is checked again
 * after the suggested delay, a `ready` batch is handed to the dispatch
 * handler, and an `empty` one (drained elsewhere) ends the chain. A
 * periodic sweep picks up batches whose check was lost, e.g. because the
 * process that scheduled it restarted.
 *
 * @module services/debounce-scheduler
 * @license MIT
 */

import type { BatchCheck, BufferStore, FlushReason } from '../storage/buffer-store.js';
import type { CanonicalMessage } from '../types/models.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

export type BatchHandler = (conversationKey: string, batch: CanonicalMessage[], reason: FlushReason) => Promise<void>;

export interface DebounceSchedulerOptions {
  sweepIntervalMs: number;
  /** Failed checks retried before the batch is left to the sweeper. */
  maxCheckRetries?: number;
  /**
   * Backoff for a failed dispatch. The batch has already left the buffer,
   * so the handler is retried here; it must tolerate a repeated batch.
   */
  dispatchRetry?: Pick<RetryOptions, 'retries' | 'baseDelayMs' | 'maxDelayMs'>;
  /** Called after each sweep; used for dedup marker housekeeping. */
  onSweep?: () => void;
  logger?: Logger;
}

const DEFAULT_DISPATCH_RETRY = { retries: 3, baseDelayMs: 2_000, maxDelayMs: 60_000 };

export class DebounceScheduler {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly chains = new Map<string, Promise<void>>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly maxCheckRetries: number;
  private readonly logger: Logger;

  constructor(
    private readonly buffer: BufferStore,
    private readonly handler: BatchHandler,
    private readonly options: DebounceSchedulerOptions
  ) {
    this.maxCheckRetries = options.maxCheckRetries ?? 3;
    this.logger = options.logger ?? createLogger('scheduler');
  }

  /**
   * Check `conversationKey` after `delayMs`, replacing any pending check.
   */
  schedule(conversationKey: string, delayMs: number = this.buffer.debounceMs): void {
    this.arm(conversationKey, delayMs, 0);
  }

  cancel(conversationKey: string): void {
    const timer = this.timers.get(conversationKey);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(conversationKey);
    }
  }

  /** Whether a check is pending for the key. */
  isScheduled(conversationKey: string): boolean {
    return this.timers.has(conversationKey);
  }

  /**
   * Start the periodic sweep.
   */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
  }

  /**
   * Cancel every pending check and the sweep. Dispatches already running
   * continue; await {@link idle} for them.
   */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  /**
   * Resolves when every dispatch started so far has finished.
   */
  async idle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  /**
   * Schedule an immediate check for every due batch without a pending one.
   */
  sweep(): void {
    try {
      for (const key of this.buffer.dueKeys()) {
        if (!this.timers.has(key)) {
          this.logger.info(`Sweeper recovered batch for ${key}`);
          this.arm(key, 0, 0);
        }
      }
      this.options.onSweep?.();
    } catch (error) {
      this.logger.error('Buffer sweep failed:', error);
    }
  }

  private arm(conversationKey: string, delayMs: number, failures: number): void {
    this.cancel(conversationKey);
    const timer = setTimeout(() => this.check(conversationKey, failures), Math.max(0, delayMs));
    this.timers.set(conversationKey, timer);
  }

  private check(conversationKey: string, failures: number): void {
    this.timers.delete(conversationKey);

    let result: BatchCheck;
    try {
      result = this.buffer.check(conversationKey);
    } catch (error) {
      if (failures < this.maxCheckRetries) {
        this.logger.warn(
          `Buffer check for ${conversationKey} failed (${failures + 1}/${this.maxCheckRetries}): ${errorMessage(error)}`
        );
        this.arm(conversationKey, this.buffer.checkIntervalMs, failures + 1);
      } else {
        this.logger.error(`Abandoning buffer check for ${conversationKey}; the sweeper will retry`, error);
      }
      return;
    }

    switch (result.status) {
      case 'empty':
        this.logger.debug(`Batch for ${conversationKey} already drained`);
        return;
      case 'waiting':
        this.arm(conversationKey, result.retryInMs, 0);
        return;
      case 'ready':
        this.logger.info(
          `Flushing ${result.messages.length} message(s) for ${conversationKey} (${result.reason})`
        );
        this.dispatch(conversationKey, result.messages, result.reason);
        return;
    }
  }

  /**
   * Run the handler after any earlier dispatch for the same key, so
   * successive batches of one conversation are handled in order.
   */
  private dispatch(conversationKey: string, batch: CanonicalMessage[], reason: FlushReason): void {
    const previous = this.chains.get(conversationKey) ?? Promise.resolve();
    const next = previous
      .then(() =>
        withRetry(() => this.handler(conversationKey, batch, reason), {
          ...DEFAULT_DISPATCH_RETRY,
          ...this.options.dispatchRetry,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(
              `Dispatch for ${conversationKey} failed (attempt ${attempt}): ${errorMessage(error)}; retrying in ${delayMs}ms`
            );
          },
        })
      )
      .catch((error: unknown) => {
        this.logger.error(`Dispatch for ${conversationKey} failed permanently; dropping ${batch.length} message(s):`, error);
      });
    this.chains.set(conversationKey, next);
    void next.then(() => {
      if (this.chains.get(conversationKey) === next) {
        this.chains.delete(conversationKey);
      }
    });
  }
}
