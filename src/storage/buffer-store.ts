/**
 * @fileoverview Durable per-conversation message buffer
 *
 * Customers often send a thought as several quick messages. The buffer
 * collects them per conversation key until the conversation has been quiet
 * for the debounce window, or until the batch has waited `maxWaitMs` since
 * its first message, then hands the whole batch over exactly once.
 *
 * Batches live in the shared SQLite database. The decision to flush and
 * the removal of the flushed messages happen in one immediate transaction,
 * so concurrent checkers in any number of processes never drain the same
 * message twice.
 *
 * @module storage/buffer-store
 * @license MIT
 */

import type { SqliteDatabase } from './database.js';
import type { CanonicalMessage } from '../types/models.js';
import { BufferStoreError } from '../utils/errors.js';

export interface BufferStoreOptions {
  debounceMs: number;
  maxWaitMs: number;
  /** Upper bound for the delay suggested by a `waiting` result. */
  checkIntervalMs: number;
  now?: () => number;
}

export type FlushReason = 'quiet' | 'max_wait';

/**
 * Result of {@link BufferStore.check}.
 *
 * - `empty`: nothing pending, usually because another checker drained it
 * - `waiting`: check again in `retryInMs`
 * - `ready`: the batch was drained and belongs to the caller alone
 */
export type BatchCheck =
  | { status: 'empty' }
  | { status: 'waiting'; retryInMs: number; size: number }
  | { status: 'ready'; reason: FlushReason; messages: CanonicalMessage[] };

export interface AddResult {
  isFirstOfBatch: boolean;
  size: number;
}

interface BatchRow {
  conversation_key: string;
  first_at: number;
  last_at: number;
  size: number;
}

interface BufferedRow {
  seq: number;
  payload: string;
}

export class BufferStore {
  readonly debounceMs: number;
  readonly maxWaitMs: number;
  readonly checkIntervalMs: number;
  private readonly now: () => number;

  constructor(private readonly db: SqliteDatabase, options: BufferStoreOptions) {
    if (options.maxWaitMs < options.debounceMs) {
      throw new RangeError('maxWaitMs must be greater than or equal to debounceMs');
    }
    this.debounceMs = options.debounceMs;
    this.maxWaitMs = options.maxWaitMs;
    this.checkIntervalMs = options.checkIntervalMs;
    this.now = options.now ?? Date.now;
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS buffer_batches (
        conversation_key TEXT PRIMARY KEY,
        first_at INTEGER NOT NULL,
        last_at INTEGER NOT NULL,
        size INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS buffer_messages (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_key TEXT NOT NULL,
        payload TEXT NOT NULL,
        added_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_buffer_messages_key ON buffer_messages(conversation_key, seq);
    `);
  }

  /**
   * Append a message to the key's pending batch.
   *
   * @returns `isFirstOfBatch` is true when this message opened a new batch;
   * the caller then schedules the first check.
   * @throws {BufferStoreError} If the message could not be persisted
   */
  addMessage(conversationKey: string, message: CanonicalMessage): AddResult {
    const add = this.db.transaction((timestamp: number): AddResult => {
      this.db
        .prepare<[string, string, number]>(
          'INSERT INTO buffer_messages (conversation_key, payload, added_at) VALUES (?, ?, ?)'
        )
        .run(conversationKey, JSON.stringify(message), timestamp);

      const batch = this.db
        .prepare<[string, number, number], { size: number }>(
          `INSERT INTO buffer_batches (conversation_key, first_at, last_at, size) VALUES (?, ?, ?, 1)
           ON CONFLICT(conversation_key) DO UPDATE
             SET last_at = excluded.last_at, size = buffer_batches.size + 1
           RETURNING size`
        )
        .get(conversationKey, timestamp, timestamp);

      const size = batch?.size ?? 1;
      return { isFirstOfBatch: size === 1, size };
    });

    try {
      return add.immediate(this.now());
    } catch (error) {
      throw new BufferStoreError(`Failed to buffer message for ${conversationKey}`, error);
    }
  }

  /**
   * Decide whether the key's batch can flush, draining it if so.
   *
   * @throws {BufferStoreError} If the buffer could not be read or drained
   */
  check(conversationKey: string): BatchCheck {
    const decide = this.db.transaction((timestamp: number): BatchCheck => {
      const batch = this.db
        .prepare<[string], BatchRow>('SELECT * FROM buffer_batches WHERE conversation_key = ?')
        .get(conversationKey);
      if (!batch) {
        return { status: 'empty' };
      }

      const quiet = timestamp - batch.last_at >= this.debounceMs;
      const forced = timestamp - batch.first_at >= this.maxWaitMs;
      if (!quiet && !forced) {
        const flushAt = Math.min(batch.last_at + this.debounceMs, batch.first_at + this.maxWaitMs);
        const retryInMs = Math.max(1, Math.min(this.checkIntervalMs, flushAt - timestamp));
        return { status: 'waiting', retryInMs, size: batch.size };
      }

      const rows = this.db
        .prepare<[string], BufferedRow>(
          'SELECT seq, payload FROM buffer_messages WHERE conversation_key = ? ORDER BY seq ASC'
        )
        .all(conversationKey);
      this.db.prepare<[string]>('DELETE FROM buffer_messages WHERE conversation_key = ?').run(conversationKey);
      this.db.prepare<[string]>('DELETE FROM buffer_batches WHERE conversation_key = ?').run(conversationKey);

      if (rows.length === 0) {
        return { status: 'empty' };
      }
      const messages = rows.map((row): CanonicalMessage => JSON.parse(row.payload));
      return { status: 'ready', reason: quiet ? 'quiet' : 'max_wait', messages };
    });

    try {
      return decide.immediate(this.now());
    } catch (error) {
      throw new BufferStoreError(`Failed to check buffer for ${conversationKey}`, error);
    }
  }

  /**
   * Keys whose batch could flush right now. Used by the sweeper to recover
   * batches whose scheduled check was lost.
   */
  dueKeys(): string[] {
    const timestamp = this.now();
    return this.db
      .prepare<[number, number], { conversation_key: string }>(
        `SELECT conversation_key FROM buffer_batches
         WHERE last_at <= ? OR first_at <= ?
         ORDER BY first_at ASC`
      )
      .all(timestamp - this.debounceMs, timestamp - this.maxWaitMs)
      .map((row) => row.conversation_key);
  }

  size(conversationKey: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM buffer_messages WHERE conversation_key = ?')
      .get(conversationKey);
    return row?.count ?? 0;
  }
}
