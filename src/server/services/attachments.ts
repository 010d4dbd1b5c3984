/**
 * Attachment lookups. chat.db stores attachment paths as
 * `~/Library/Messages/Attachments/...`, sometimes percent-encoded.
 */

import { homedir } from 'node:os';

import type { ChatDb } from './chatDb.js';
import type { Attachment, AttachmentFile } from '../types/index.js';

interface AttachmentRow {
  attachment_id: number;
  filename: string | null;
  mime_type: string | null;
  transfer_name: string | null;
}

interface AttachmentPathRow {
  filename: string | null;
  mime_type: string | null;
}

/** API path serving an attachment's bytes. */
export function attachmentUrl(attachmentId: number): string {
  return `/api/attachments/${attachmentId}`;
}

/**
 * Decode `%XX` escapes as UTF-8. Malformed escapes are left as they are,
 * unlike decodeURIComponent which throws on them.
 */
export function percentDecode(value: string): string {
  return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) =>
    Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'),
  );
}

/** Expand a leading `~` to the home directory, then percent-decode. */
export function resolveAttachmentPath(filename: string, home: string = homedir()): string {
  const expanded = filename.startsWith('~') ? home + filename.slice(1) : filename;
  return percentDecode(expanded);
}

/** Attachments linked to a message. */
export function getAttachmentsForMessage(db: ChatDb, messageId: number): Attachment[] {
  const rows = db
    .prepare<[number], AttachmentRow>(
      `SELECT a.ROWID AS attachment_id, a.filename, a.mime_type, a.transfer_name
         FROM attachment a
         JOIN message_attachment_join maj ON maj.attachment_id = a.ROWID
        WHERE maj.message_id = ?
        ORDER BY a.ROWID`,
    )
    .all(messageId);

  return rows.map((row) => ({
    id: row.attachment_id,
    filename: row.transfer_name || row.filename || 'attachment',
    mimeType: row.mime_type,
    url: attachmentUrl(row.attachment_id),
  }));
}

/** Filesystem path and MIME type of an attachment, or null if unknown. */
export function getAttachmentFile(db: ChatDb, attachmentId: number): AttachmentFile | null {
  const row = db
    .prepare<[number], AttachmentPathRow>(
      'SELECT filename, mime_type FROM attachment WHERE ROWID = ?',
    )
    .get(attachmentId);

  if (!row || !row.filename) {
    return null;
  }
  return { path: resolveAttachmentPath(row.filename), mimeType: row.mime_type };
}
