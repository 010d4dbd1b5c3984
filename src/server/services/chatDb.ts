/**
 * Read-only access to the Apple Messages chat.db.
 *
 * Messages.app keeps writing to the database while we read it, and its
 * schema shifts between macOS releases, so every request opens its own
 * short-lived read-only connection and secondary lookups are allowed to
 * fail on their own without failing the response.
 */

import Database from 'better-sqlite3';

import { StoreUnavailableError } from '../errors.js';
import type { Logger } from '../types/index.js';

export type ChatDb = Database.Database;

/** Style code Messages uses for group chats. */
export const GROUP_CHAT_STYLE = 43;

/** Open the database read-only. Throws StoreUnavailableError if it cannot be opened. */
export function openChatDb(path: string): ChatDb {
  try {
    return new Database(path, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new StoreUnavailableError(path, err);
  }
}

/**
 * Run `fn` against a fresh read-only connection, closing it on every
 * exit path.
 */
export function withChatDb<T>(path: string, fn: (db: ChatDb) => T): T {
  const db = openChatDb(path);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/**
 * Run a secondary query, substituting `fallback` when it throws (missing
 * table or column, malformed row). The failure is logged, never rethrown.
 */
export function orDefault<T>(label: string, fallback: T, op: () => T, log: Logger): T {
  try {
    return op();
  } catch (err) {
    log.warn({ err, query: label }, 'Sub-query failed, using default');
    return fallback;
  }
}

interface HandleRow {
  id: string;
}

/** Participant handles (phone numbers/emails) of a chat. */
export function getChatHandles(db: ChatDb, chatId: number): string[] {
  return db
    .prepare<[number], HandleRow>(
      `SELECT h.id
         FROM handle h
         JOIN chat_handle_join chj ON chj.handle_id = h.ROWID
        WHERE chj.chat_id = ?`,
    )
    .all(chatId)
    .map((row) => row.id);
}
