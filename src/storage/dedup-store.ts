/**
 * @fileoverview Time-bounded deduplication of inbound webhook deliveries
 *
 * WhatsApp retries webhooks it considers undelivered, so the same message
 * id can arrive several times within seconds. Each `(conversation, message
 * id)` pair gets a marker with an expiry in the shared SQLite database; the
 * first caller to create (or revive an expired) marker wins.
 *
 * @module storage/dedup-store
 * @license MIT
 */

import type { SqliteDatabase } from './database.js';
import { DeduplicationError } from '../utils/errors.js';

export interface DedupStoreOptions {
  /** Marker lifetime. */
  ttlMs: number;
  now?: () => number;
  /**
   * Consulted after winning a marker. Returning true marks the delivery as
   * a duplicate of a message already persisted before the marker expired.
   */
  seenBefore?: (messageId: string) => boolean;
}

export interface DedupStats {
  backend: 'sqlite';
  entries: number;
  ttlMs: number;
  healthy: boolean;
}

export class DedupStore {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly seenBefore?: (messageId: string) => boolean;

  constructor(private readonly db: SqliteDatabase, options: DedupStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.seenBefore = options.seenBefore;
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS dedup_records (
        record_key TEXT PRIMARY KEY,
        expires_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_dedup_expires_at ON dedup_records(expires_at);
    `);
  }

  private static recordKey(messageId: string, conversationKey: string): string {
    return `${conversationKey}:${messageId}`;
  }

  /**
   * Atomically claim `messageId` for `conversationKey`.
   *
   * @returns false for the first caller (process the message), true for
   * every later caller until the marker expires
   * @throws {DeduplicationError} If the store cannot answer
   */
  isDuplicate(messageId: string, conversationKey: string): boolean {
    const timestamp = this.now();
    let claimed: boolean;
    try {
      // Insert, or take over a marker whose expiry has passed. Any live
      // marker makes the upsert a no-op (changes = 0).
      const result = this.db
        .prepare<[string, number, number]>(
          `INSERT INTO dedup_records (record_key, expires_at, created_at) VALUES (?, ?, ?)
           ON CONFLICT(record_key) DO UPDATE
             SET expires_at = excluded.expires_at, created_at = excluded.created_at
             WHERE dedup_records.expires_at <= excluded.created_at`
        )
        .run(DedupStore.recordKey(messageId, conversationKey), timestamp + this.ttlMs, timestamp);
      claimed = result.changes === 1;
    } catch (error) {
      throw new DeduplicationError(`Deduplication check failed for ${messageId}`, error);
    }

    if (!claimed) {
      return true;
    }
    if (this.seenBefore) {
      try {
        return this.seenBefore(messageId);
      } catch (error) {
        throw new DeduplicationError(`History lookup failed for ${messageId}`, error);
      }
    }
    return false;
  }

  /**
   * Drop the marker so a redelivery is processed again.
   */
  release(messageId: string, conversationKey: string): void {
    try {
      this.db
        .prepare<[string]>('DELETE FROM dedup_records WHERE record_key = ?')
        .run(DedupStore.recordKey(messageId, conversationKey));
    } catch (error) {
      throw new DeduplicationError(`Failed to release marker for ${messageId}`, error);
    }
  }

  /**
   * Delete expired markers.
   *
   * @returns Number of markers removed
   */
  purgeExpired(): number {
    return this.db.prepare<[number]>('DELETE FROM dedup_records WHERE expires_at <= ?').run(this.now()).changes;
  }

  stats(): DedupStats {
    try {
      const row = this.db
        .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM dedup_records WHERE expires_at > ?')
        .get(this.now());
      return { backend: 'sqlite', entries: row?.count ?? 0, ttlMs: this.ttlMs, healthy: true };
    } catch {
      return { backend: 'sqlite', entries: 0, ttlMs: this.ttlMs, healthy: false };
    }
  }
}
