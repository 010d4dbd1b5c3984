import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { APPLE_EPOCH_OFFSET } from '../../services/dateConvert.js';

// ── Minimal chat.db schema (the columns the service reads) ─────────

const TABLES = {
  chat: `CREATE TABLE chat (
    ROWID INTEGER PRIMARY KEY AUTOINCREMENT,
    guid TEXT,
    chat_identifier TEXT,
    display_name TEXT,
    style INTEGER
  )`,
  handle: `CREATE TABLE handle (
    ROWID INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL
  )`,
  chat_handle_join: `CREATE TABLE chat_handle_join (chat_id INTEGER, handle_id INTEGER)`,
  message: `CREATE TABLE message (
    ROWID INTEGER PRIMARY KEY AUTOINCREMENT,
    guid TEXT NOT NULL,
    text TEXT,
    attributedBody BLOB,
    handle_id INTEGER DEFAULT 0,
    is_from_me INTEGER DEFAULT 0,
    date INTEGER,
    date_read INTEGER DEFAULT 0,
    associated_message_guid TEXT,
    associated_message_type INTEGER DEFAULT 0
  )`,
  chat_message_join: `CREATE TABLE chat_message_join (chat_id INTEGER, message_id INTEGER)`,
  attachment: `CREATE TABLE attachment (
    ROWID INTEGER PRIMARY KEY AUTOINCREMENT,
    filename TEXT,
    mime_type TEXT,
    transfer_name TEXT
  )`,
  message_attachment_join: `CREATE TABLE message_attachment_join (message_id INTEGER, attachment_id INTEGER)`,
} as const;

export type TableName = keyof typeof TABLES;

const TABLE_NAMES: TableName[] = [
  'chat',
  'handle',
  'chat_handle_join',
  'message',
  'chat_message_join',
  'attachment',
  'message_attachment_join',
];

/** Apple nanosecond timestamp for a whole-second ISO instant. */
export function appleNanos(iso: string): bigint {
  const unixSeconds = Date.parse(iso) / 1000;
  return BigInt(unixSeconds - APPLE_EPOCH_OFFSET) * 1_000_000_000n;
}

export interface ChatSeed {
  chatIdentifier?: string | null;
  displayName?: string | null;
  style?: number;
  handles?: string[];
}

export interface MessageSeed {
  chatId: number;
  guid: string;
  /** ISO instant of `message.date`. */
  at: string;
  text?: string | null;
  /** A number stores a malformed, non-blob value. */
  attributedBody?: Buffer | number | null;
  isFromMe?: boolean;
  readAt?: string;
  handle?: string;
  associatedGuid?: string;
  associatedType?: number;
}

export interface AttachmentSeed {
  filename: string | null;
  mimeType?: string | null;
  transferName?: string | null;
}

/**
 * A throwaway chat.db on disk. Seed it, call `close()`, then point the
 * read-only service code at `path`.
 */
export class ChatDbFixture {
  readonly dir: string;
  readonly path: string;
  private readonly db: Database.Database;
  private readonly handleIds = new Map<string, number>();
  private chatCount = 0;

  constructor(options: { omitTables?: TableName[] } = {}) {
    this.dir = mkdtempSync(join(tmpdir(), 'on-this-day-test-'));
    this.path = join(this.dir, 'chat.db');
    this.db = new Database(this.path);
    const omit = new Set(options.omitTables ?? []);
    for (const name of TABLE_NAMES) {
      if (!omit.has(name)) {
        this.db.exec(TABLES[name]);
      }
    }
  }

  private handleRowId(handle: string): number {
    const existing = this.handleIds.get(handle);
    if (existing !== undefined) return existing;
    const id = Number(this.db.prepare('INSERT INTO handle (id) VALUES (?)').run(handle).lastInsertRowid);
    this.handleIds.set(handle, id);
    return id;
  }

  addChat(seed: ChatSeed = {}): number {
    this.chatCount += 1;
    const chatId = Number(
      this.db
        .prepare('INSERT INTO chat (guid, chat_identifier, display_name, style) VALUES (?, ?, ?, ?)')
        .run(`chat-guid-${this.chatCount}`, seed.chatIdentifier ?? null, seed.displayName ?? null, seed.style ?? 45)
        .lastInsertRowid,
    );
    for (const handle of seed.handles ?? []) {
      this.db
        .prepare('INSERT INTO chat_handle_join (chat_id, handle_id) VALUES (?, ?)')
        .run(chatId, this.handleRowId(handle));
    }
    return chatId;
  }

  addMessage(seed: MessageSeed): number {
    const messageId = Number(
      this.db
        .prepare(
          `INSERT INTO message (guid, text, attributedBody, handle_id, is_from_me, date, date_read,
                                associated_message_guid, associated_message_type)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          seed.guid,
          seed.text ?? null,
          seed.attributedBody ?? null,
          seed.handle ? this.handleRowId(seed.handle) : 0,
          seed.isFromMe ? 1 : 0,
          appleNanos(seed.at),
          seed.readAt ? appleNanos(seed.readAt) : 0,
          seed.associatedGuid ?? null,
          seed.associatedType ?? 0,
        ).lastInsertRowid,
    );
    this.db
      .prepare('INSERT INTO chat_message_join (chat_id, message_id) VALUES (?, ?)')
      .run(seed.chatId, messageId);
    return messageId;
  }

  addAttachment(messageId: number, seed: AttachmentSeed): number {
    const attachmentId = Number(
      this.db
        .prepare('INSERT INTO attachment (filename, mime_type, transfer_name) VALUES (?, ?, ?)')
        .run(seed.filename, seed.mimeType ?? null, seed.transferName ?? null).lastInsertRowid,
    );
    this.db
      .prepare('INSERT INTO message_attachment_join (message_id, attachment_id) VALUES (?, ?)')
      .run(messageId, attachmentId);
    return attachmentId;
  }

  /** Stop writing; the file stays until cleanup(). */
  close(): void {
    if (this.db.open) this.db.close();
  }

  cleanup(): void {
    this.close();
    rmSync(this.dir, { recursive: true, force: true });
  }
}

/** A minimal attributedBody blob carrying `text` after the NSString marker. */
export function attributedBodyFor(text: string): Buffer {
  const payload = Buffer.from(text, 'utf8');
  if (payload.length > 0x7f) {
    throw new Error('attributedBodyFor only builds single-byte lengths');
  }
  return Buffer.concat([
    Buffer.from([0x04, 0x0b]),
    Buffer.from('streamtyped'),
    Buffer.from([0x81, 0xe8, 0x03, 0x84, 0x01, 0x40, 0x84, 0x84, 0x84]),
    Buffer.from('NSAttributedString'),
    Buffer.from([0x00, 0x84, 0x84]),
    Buffer.from('NSObject'),
    Buffer.from([0x00, 0x85, 0x92, 0x84, 0x84, 0x84]),
    Buffer.from('NSString'),
    Buffer.from([0x01, 0x94, 0x84, 0x01, 0x2b, payload.length]),
    payload,
    Buffer.from([0x86, 0x84, 0x02, 0x69, 0x49, 0x01]),
  ]);
}
