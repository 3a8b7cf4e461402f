/**
 * @fileoverview AI session storage
 *
 * The AI responder keeps its own per-thread memory (chat history and the
 * `operatorActive` flag) in a separate SQLite database. The conversation
 * table stays authoritative for routing; this store is a mirror that
 * background tasks keep in step after takeovers, handbacks and operator
 * messages.
 *
 * @module storage/session-store
 * @license MIT
 */

import { openDatabase, pingDatabase, type SqliteDatabase } from './database.js';
import { ResourcePool } from './resource-pool.js';
import { isTransientDatabaseError } from '../utils/retry.js';

export type SessionRole = 'system' | 'user' | 'assistant';

export interface SessionMessage {
  role: SessionRole;
  content: string;
}

export interface AiSession {
  threadId: string;
  operatorActive: boolean;
  messages: SessionMessage[];
  updatedAt: Date;
}

interface SessionRow {
  thread_id: string;
  operator_active: number;
  messages: string;
  updated_at: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ai_sessions (
    thread_id TEXT PRIMARY KEY,
    operator_active INTEGER NOT NULL DEFAULT 0,
    messages TEXT NOT NULL DEFAULT '[]',
    updated_at INTEGER NOT NULL
  );
`;

/**
 * SessionStore reads and writes AI sessions through a connection pool.
 *
 * @example
 * const sessions = SessionStore.open('./data/ai-sessions.db');
 * await sessions.setOperatorActive('15551234567', true);
 * await sessions.appendMessages('15551234567', [{ role: 'user', content: 'Hi' }]);
 */
export class SessionStore {
  constructor(
    private readonly pool: ResourcePool<SqliteDatabase>,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Build a store over a pooled connection to `path`. In-memory databases
   * are per connection, so `:memory:` always gets a single connection.
   */
  static open(path: string, options: { maxConnections?: number; now?: () => number } = {}): SessionStore {
    const pool = new ResourcePool<SqliteDatabase>({
      create: () => {
        const db = openDatabase(path);
        db.exec(SCHEMA);
        return db;
      },
      destroy: (db) => {
        db.close();
      },
      validate: pingDatabase,
      isConnectionError: (error) => isTransientDatabaseError(error) && !isBusy(error),
      max: path === ':memory:' ? 1 : options.maxConnections ?? 4,
    });
    return new SessionStore(pool, options.now);
  }

  async get(threadId: string): Promise<AiSession | null> {
    return this.pool.use((db) => {
      const row = db.prepare<[string], SessionRow>('SELECT * FROM ai_sessions WHERE thread_id = ?').get(threadId);
      return row ? rowToSession(row) : null;
    });
  }

  async setOperatorActive(threadId: string, active: boolean): Promise<void> {
    await this.pool.use((db) => {
      db.prepare<[string, number, number]>(
        `INSERT INTO ai_sessions (thread_id, operator_active, messages, updated_at) VALUES (?, ?, '[]', ?)
         ON CONFLICT(thread_id) DO UPDATE
           SET operator_active = excluded.operator_active, updated_at = excluded.updated_at`
      ).run(threadId, active ? 1 : 0, this.now());
    });
  }

  /**
   * Append to a thread's history in one read-modify-write transaction.
   */
  async appendMessages(threadId: string, messages: SessionMessage[]): Promise<void> {
    if (messages.length === 0) return;
    await this.pool.use((db) => {
      const append = db.transaction(() => {
        const row = db
          .prepare<[string], { messages: string }>('SELECT messages FROM ai_sessions WHERE thread_id = ?')
          .get(threadId);
        const existing: SessionMessage[] = row ? JSON.parse(row.messages) : [];
        db.prepare<[string, string, number]>(
          `INSERT INTO ai_sessions (thread_id, operator_active, messages, updated_at) VALUES (?, 0, ?, ?)
           ON CONFLICT(thread_id) DO UPDATE SET messages = excluded.messages, updated_at = excluded.updated_at`
        ).run(threadId, JSON.stringify([...existing, ...messages]), this.now());
      });
      append.immediate();
    });
  }

  /**
   * The last `limit` messages of a thread, oldest first.
   */
  async history(threadId: string, limit: number): Promise<SessionMessage[]> {
    const session = await this.get(threadId);
    if (!session) return [];
    return limit > 0 ? session.messages.slice(-limit) : [];
  }

  async close(): Promise<void> {
    await this.pool.drain();
  }
}

function isBusy(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_BUSY')
  );
}

function rowToSession(row: SessionRow): AiSession {
  const messages: SessionMessage[] = JSON.parse(row.messages);
  return {
    threadId: row.thread_id,
    operatorActive: row.operator_active === 1,
    messages,
    updatedAt: new Date(row.updated_at),
  };
}
