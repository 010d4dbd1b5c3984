/**
 * Finds every chat with messages on a given calendar day, in any year.
 */

import { extractText } from './attributedBody.js';
import { GROUP_CHAT_STYLE, getChatHandles, orDefault } from './chatDb.js';
import type { ChatDb } from './chatDb.js';
import {
  LOCAL_MESSAGE_DATETIME_SQL,
  fromArchiveEpoch,
  monthDayKey,
  toLocalIso,
} from './dateConvert.js';
import { sanitizeText, truncateCodePoints } from './sanitize.js';
import type { ConversationSummary, Logger } from '../types/index.js';

const PREVIEW_LENGTH = 100;

interface ChatDayRow {
  chat_id: number;
  display_name: string | null;
  chat_identifier: string | null;
  chat_style: number | null;
  message_count: number;
  years: string | null;
  last_date: number | null;
}

interface PreviewRow {
  text: unknown;
  attributedBody: unknown;
}

/** Parse a GROUP_CONCAT of years into distinct years, most recent first. */
export function parseYears(concatenated: string | null): number[] {
  const years = new Set<number>();
  for (const part of (concatenated ?? '').split(',')) {
    const year = Number.parseInt(part, 10);
    if (Number.isInteger(year)) {
      years.add(year);
    }
  }
  return [...years].sort((a, b) => b - a);
}

/**
 * Text of a message: the text column, else whatever the blob yields.
 * Both columns are read as untyped values.
 */
export function messageText(text: unknown, attributedBody: unknown): string | null {
  const plain = typeof text === 'string' ? sanitizeText(text) : null;
  if (plain) {
    return plain;
  }
  return extractText(attributedBody) ?? plain;
}

/** Preview of the latest message a chat has on the day. */
export function getDayPreview(db: ChatDb, chatId: number, mmDd: string): string {
  const row = db
    .prepare<[number, string], PreviewRow>(
      `SELECT m.text, m.attributedBody
         FROM message m
         JOIN chat_message_join cmj ON cmj.message_id = m.ROWID
        WHERE cmj.chat_id = ?
          AND strftime('%m-%d', ${LOCAL_MESSAGE_DATETIME_SQL}) = ?
        ORDER BY m.date DESC
        LIMIT 1`,
    )
    .get(chatId, mmDd);

  if (!row) {
    return '';
  }
  return truncateCodePoints(messageText(row.text, row.attributedBody) ?? '', PREVIEW_LENGTH);
}

/**
 * All chats with at least one message on `month`/`day` (local time) in any
 * year, most recently active first. Display names are returned raw
 * (`display_name`, else `chat_identifier`).
 */
export function getConversationsOnDay(
  db: ChatDb,
  month: number,
  day: number,
  log: Logger,
): ConversationSummary[] {
  const mmDd = monthDayKey(month, day);

  const rows = db
    .prepare<[string], ChatDayRow>(
      `SELECT c.ROWID AS chat_id,
              c.display_name,
              c.chat_identifier,
              c.style AS chat_style,
              COUNT(DISTINCT m.ROWID) AS message_count,
              GROUP_CONCAT(DISTINCT strftime('%Y', ${LOCAL_MESSAGE_DATETIME_SQL})) AS years,
              MAX(m.date) AS last_date
         FROM chat c
         JOIN chat_message_join cmj ON cmj.chat_id = c.ROWID
         JOIN message m ON m.ROWID = cmj.message_id
        WHERE strftime('%m-%d', ${LOCAL_MESSAGE_DATETIME_SQL}) = ?
        GROUP BY c.ROWID
        ORDER BY last_date DESC`,
    )
    .all(mmDd);

  log.debug({ mmDd, chats: rows.length }, 'Chats active on day');

  return rows.map((row) => {
    const style = row.chat_style ?? 0;
    return {
      chatId: row.chat_id,
      displayName: row.display_name || row.chat_identifier || '',
      handles: orDefault<string[]>(`handles:${row.chat_id}`, [], () => getChatHandles(db, row.chat_id), log),
      isGroup: style === GROUP_CHAT_STYLE,
      style,
      messageCount: row.message_count,
      years: parseYears(row.years),
      lastMessagePreview: orDefault(`preview:${row.chat_id}`, '', () => getDayPreview(db, row.chat_id, mmDd), log),
      lastMessageDate: toLocalIso(fromArchiveEpoch(row.last_date)),
    };
  });
}
