/**
 * @fileoverview Message storage implementation using SQLite
 *
 * This module provides persistent storage for inbound and outbound
 * WhatsApp messages. Rows are append-only apart from their delivery
 * status, which status webhooks move forward by provider message id.
 *
 * @module storage/message-store
 * @license MIT
 */

import type { SqliteDatabase } from './database.js';
import type {
  MediaInfo,
  Message,
  MessageDirection,
  MessageStatus,
  NewMessage,
  SenderType,
} from '../types/models.js';

interface MessageRow {
  id: number;
  conversation_id: number;
  direction: MessageDirection;
  sender_type: SenderType;
  sender_id: string | null;
  external_id: string | null;
  has_text: number;
  message_text: string | null;
  media_info: string | null;
  status: MessageStatus;
  error_code: string | null;
  error_message: string | null;
  provider_ts: number | null;
  created_at: number;
  extra_metadata: string | null;
}

/** Outcome of {@link MessageStore.updateStatus}. */
export type StatusUpdateResult = 'updated' | 'unchanged' | 'not_found';

const STATUS_RANK: Record<Exclude<MessageStatus, 'failed'>, number> = {
  pending: 0,
  sent: 1,
  delivered: 2,
  read: 3,
};

/**
 * Whether a message in `current` may move to `next`.
 *
 * @description
 * Statuses only move forward: `pending < sent < delivered < read`.
 * `failed` replaces `pending` or `sent` only, and nothing replaces it.
 * Re-applying the current status is not a transition.
 */
export function canTransition(current: MessageStatus, next: MessageStatus): boolean {
  if (current === 'failed') {
    return false;
  }
  if (next === 'failed') {
    return current === 'pending' || current === 'sent';
  }
  return STATUS_RANK[next] > STATUS_RANK[current];
}

/**
 * MessageStore manages persistent storage of WhatsApp messages.
 *
 * @description
 * Key features:
 * - Append inbound customer messages and outbound AI/operator replies
 * - Ignore re-inserts of an already stored provider id
 * - Monotonic, idempotent delivery status updates
 * - Chronological thread reads for AI history and operator tools
 *
 * `externalId` (the WhatsApp message id) is unique and is the join key for
 * status updates and reply-context lookups.
 *
 * @example
 * const stored = messageStore.insert({
 *   conversationId: 12,
 *   direction: 'outbound',
 *   senderType: 'ai',
 *   externalId: 'wamid.abc',
 *   text: 'Hello!',
 * });
 *
 * messageStore.updateStatus('wamid.abc', 'delivered'); // 'updated'
 * messageStore.updateStatus('wamid.abc', 'sent');      // 'unchanged'
 */
export class MessageStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly now: () => number = Date.now
  ) {
    this.initialize();
  }

  /**
   * Creates the messages table and indexes if they don't exist.
   *
   * @private
   */
  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id INTEGER NOT NULL REFERENCES conversations(id),
        direction TEXT NOT NULL,
        sender_type TEXT NOT NULL,
        sender_id TEXT,
        external_id TEXT UNIQUE,
        has_text INTEGER NOT NULL DEFAULT 0,
        message_text TEXT,
        media_info TEXT,
        status TEXT NOT NULL DEFAULT 'pending',
        error_code TEXT,
        error_message TEXT,
        provider_ts INTEGER,
        created_at INTEGER NOT NULL,
        extra_metadata TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, id);
    `);
  }

  /**
   * Store a new message with status `pending`.
   *
   * @returns The stored row, or null when a message with the same
   * `externalId` already exists.
   */
  insert(message: NewMessage): Message | null {
    const row = this.db
      .prepare<
        [
          number,
          MessageDirection,
          SenderType,
          string | null,
          string | null,
          number,
          string | null,
          string | null,
          number | null,
          number,
          string | null,
        ],
        MessageRow
      >(
        `INSERT INTO messages (
           conversation_id, direction, sender_type, sender_id, external_id,
           has_text, message_text, media_info, status, provider_ts, created_at, extra_metadata
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?, ?)
         ON CONFLICT(external_id) DO NOTHING
         RETURNING *`
      )
      .get(
        message.conversationId,
        message.direction,
        message.senderType,
        message.senderId ?? null,
        message.externalId,
        message.text ? 1 : 0,
        message.text,
        message.media ? JSON.stringify(message.media) : null,
        message.providerTimestamp ? message.providerTimestamp.getTime() : null,
        this.now(),
        message.metadata ? JSON.stringify(message.metadata) : null
      );
    return row ? this.rowToMessage(row) : null;
  }

  getById(id: number): Message | null {
    const row = this.db.prepare<[number], MessageRow>('SELECT * FROM messages WHERE id = ?').get(id);
    return row ? this.rowToMessage(row) : null;
  }

  getByExternalId(externalId: string): Message | null {
    const row = this.db
      .prepare<[string], MessageRow>('SELECT * FROM messages WHERE external_id = ?')
      .get(externalId);
    return row ? this.rowToMessage(row) : null;
  }

  /**
   * Whether an inbound message with this provider id was already stored.
   */
  existsInbound(externalId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>(
        "SELECT 1 AS found FROM messages WHERE external_id = ? AND direction = 'inbound'"
      )
      .get(externalId);
    return row !== undefined;
  }

  /**
   * The latest `limit` messages of a conversation, oldest first.
   */
  getByConversation(conversationId: number, limit: number = 100): Message[] {
    const rows = this.db
      .prepare<[number, number], MessageRow>(
        `SELECT * FROM (
           SELECT * FROM messages WHERE conversation_id = ? ORDER BY id DESC LIMIT ?
         ) ORDER BY id ASC`
      )
      .all(conversationId, limit);
    return rows.map((row) => this.rowToMessage(row));
  }

  countByConversation(conversationId: number): number {
    const row = this.db
      .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM messages WHERE conversation_id = ?')
      .get(conversationId);
    return row?.count ?? 0;
  }

  /**
   * Apply a delivery status reported by WhatsApp.
   *
   * @description
   * Idempotent and monotonic (see {@link canTransition}): a stale or
   * repeated status leaves the row alone and reports `unchanged`. Error
   * details are only written together with `failed`.
   */
  updateStatus(
    externalId: string,
    status: MessageStatus,
    error?: { code: string; message: string } | null
  ): StatusUpdateResult {
    const apply = this.db.transaction((): StatusUpdateResult => {
      const row = this.db
        .prepare<[string], { status: MessageStatus }>('SELECT status FROM messages WHERE external_id = ?')
        .get(externalId);
      if (!row) {
        return 'not_found';
      }
      if (!canTransition(row.status, status)) {
        return 'unchanged';
      }
      const failed = status === 'failed';
      this.db
        .prepare<[MessageStatus, string | null, string | null, string]>(
          'UPDATE messages SET status = ?, error_code = ?, error_message = ? WHERE external_id = ?'
        )
        .run(status, failed ? error?.code ?? null : null, failed ? error?.message ?? null : null, externalId);
      return 'updated';
    });
    return apply.immediate();
  }

  private rowToMessage(row: MessageRow): Message {
    const media: MediaInfo | null = row.media_info ? JSON.parse(row.media_info) : null;
    const metadata: Record<string, unknown> | null = row.extra_metadata ? JSON.parse(row.extra_metadata) : null;
    return {
      id: row.id,
      conversationId: row.conversation_id,
      direction: row.direction,
      senderType: row.sender_type,
      senderId: row.sender_id,
      externalId: row.external_id,
      hasText: row.has_text === 1,
      text: row.message_text,
      media,
      status: row.status,
      errorCode: row.error_code,
      errorMessage: row.error_message,
      providerTimestamp: row.provider_ts !== null ? new Date(row.provider_ts) : null,
      createdAt: new Date(row.created_at),
      metadata,
    };
  }
}
