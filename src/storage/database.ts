/**
 * @fileoverview SQLite connection factory
 *
 * All durable state (conversations, messages, dedup markers, buffered
 * batches) lives in one SQLite file opened in WAL mode, so several
 * processes pointed at the same `DATABASE_PATH` share it. Writers use
 * immediate transactions and wait on `busy_timeout` instead of failing.
 *
 * @module storage/database
 * @license MIT
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

/** Milliseconds a writer waits on a locked database before SQLITE_BUSY. */
export const BUSY_TIMEOUT_MS = 5_000;

/**
 * Open (creating if needed) a SQLite database with the pragmas every store
 * relies on. `:memory:` is accepted for tests.
 */
export function openDatabase(path: string): SqliteDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  db.pragma('foreign_keys = ON');
  return db;
}

/**
 * Cheap liveness probe used by health checks and pool validation.
 */
export function pingDatabase(db: SqliteDatabase): boolean {
  try {
    const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  } catch {
    return false;
  }
}
