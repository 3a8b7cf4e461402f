/**
 * @fileoverview Conversation storage implementation using SQLite
 *
 * This module stores one conversation per customer phone number together
 * with the durable `human_intervention_required` flag that decides whether
 * inbound messages are answered by the AI or held for an operator.
 *
 * @module storage/conversation-store
 * @license MIT
 */

import type { SqliteDatabase } from './database.js';
import type { Conversation } from '../types/models.js';

interface ConversationRow {
  id: number;
  phone: string;
  name: string | null;
  last_message_id: number | null;
  human_intervention_required: number;
  created_at: number;
  updated_at: number;
}

/**
 * ConversationStore manages conversations keyed by customer phone.
 *
 * @description
 * Key features:
 * - Find-or-create by phone (unique)
 * - Durable operator-takeover flag with change detection
 * - Last-message pointer for thread summaries
 *
 * The store does not open its own connection: it is handed the shared
 * database so that callers can wrap several stores in one transaction.
 *
 * @example
 * const store = new ConversationStore(openDatabase('./data/wa-relay.db'));
 * const { conversation, created } = store.findOrCreate('15551234567', 'Dana');
 * store.setInterventionRequired(conversation.id, true); // true: value changed
 */
export class ConversationStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly now: () => number = Date.now
  ) {
    this.initialize();
  }

  /**
   * Creates the conversations table and indexes if they don't exist.
   *
   * @private
   */
  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        phone TEXT NOT NULL UNIQUE,
        name TEXT,
        last_message_id INTEGER,
        human_intervention_required INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_updated_at ON conversations(updated_at);
    `);
  }

  findByPhone(phone: string): Conversation | null {
    const row = this.db
      .prepare<[string], ConversationRow>('SELECT * FROM conversations WHERE phone = ?')
      .get(phone);
    return row ? this.rowToConversation(row) : null;
  }

  getById(id: number): Conversation | null {
    const row = this.db.prepare<[number], ConversationRow>('SELECT * FROM conversations WHERE id = ?').get(id);
    return row ? this.rowToConversation(row) : null;
  }

  /**
   * Create a conversation in the AI-handled state.
   *
   * @throws {Error} SQLITE_CONSTRAINT_UNIQUE if the phone already has one
   */
  create(phone: string, name: string | null = null): Conversation {
    const timestamp = this.now();
    const row = this.db
      .prepare<[string, string | null, number, number], ConversationRow>(
        `INSERT INTO conversations (phone, name, human_intervention_required, created_at, updated_at)
         VALUES (?, ?, 0, ?, ?)
         RETURNING *`
      )
      .get(phone, name, timestamp, timestamp);
    if (!row) {
      throw new Error(`Failed to create conversation for ${phone}`);
    }
    return this.rowToConversation(row);
  }

  /**
   * Return the conversation for `phone`, creating it on first contact.
   * A newly reported profile name replaces the stored one.
   */
  findOrCreate(phone: string, name: string | null = null): { conversation: Conversation; created: boolean } {
    const existing = this.findByPhone(phone);
    if (!existing) {
      return { conversation: this.create(phone, name), created: true };
    }
    if (name && name !== existing.name) {
      this.db
        .prepare<[string, number, number]>('UPDATE conversations SET name = ?, updated_at = ? WHERE id = ?')
        .run(name, this.now(), existing.id);
      return { conversation: { ...existing, name }, created: false };
    }
    return { conversation: existing, created: false };
  }

  /**
   * Set the operator-takeover flag.
   *
   * @returns Whether the stored value changed (false for a repeated call)
   */
  setInterventionRequired(conversationId: number, required: boolean): boolean {
    const result = this.db
      .prepare<[number, number, number, number]>(
        `UPDATE conversations
         SET human_intervention_required = ?, updated_at = ?
         WHERE id = ? AND human_intervention_required != ?`
      )
      .run(required ? 1 : 0, this.now(), conversationId, required ? 1 : 0);
    return result.changes === 1;
  }

  setLastMessage(conversationId: number, messageId: number): void {
    this.db
      .prepare<[number, number, number]>('UPDATE conversations SET last_message_id = ?, updated_at = ? WHERE id = ?')
      .run(messageId, this.now(), conversationId);
  }

  /**
   * Most recently active conversations first. `operatorOnly` restricts the
   * list to conversations waiting for a human.
   */
  listRecent(limit: number = 50, options: { operatorOnly?: boolean } = {}): Conversation[] {
    const where = options.operatorOnly ? 'WHERE human_intervention_required = 1' : '';
    const rows = this.db
      .prepare<[number], ConversationRow>(
        `SELECT * FROM conversations ${where} ORDER BY updated_at DESC, id DESC LIMIT ?`
      )
      .all(limit);
    return rows.map((row) => this.rowToConversation(row));
  }

  private rowToConversation(row: ConversationRow): Conversation {
    return {
      id: row.id,
      phone: row.phone,
      name: row.name,
      lastMessageId: row.last_message_id,
      humanInterventionRequired: row.human_intervention_required === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
