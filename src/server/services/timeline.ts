/**
 * Builds the year-grouped timeline of one chat on a calendar day.
 *
 * Tapback rows are separate messages in chat.db that point at their
 * target through `associated_message_guid`; they are folded into the
 * message they react to rather than shown as messages of their own.
 */

import { getAttachmentsForMessage } from './attachments.js';
import { GROUP_CHAT_STYLE, getChatHandles, orDefault } from './chatDb.js';
import type { ChatDb } from './chatDb.js';
import { messageText } from './conversations.js';
import {
  LOCAL_MESSAGE_DATETIME_SQL,
  fromArchiveEpoch,
  monthDayKey,
  toLocalIso,
} from './dateConvert.js';
import { TAPBACK_EMOJI, classifyMessage } from './tapbacks.js';
import type {
  Attachment,
  ConversationTimeline,
  Logger,
  Message,
  Tapback,
  YearGroup,
} from '../types/index.js';

interface ChatRow {
  chat_id: number;
  display_name: string | null;
  chat_identifier: string | null;
  style: number | null;
}

interface DayMessageRow {
  message_id: number;
  guid: string;
  text: unknown;
  attributedBody: unknown;
  is_from_me: number;
  date: number;
  /** strftime('%Y') of the local datetime, as in the day listing. */
  year: string;
  date_read: number | null;
  associated_message_guid: string | null;
  associated_message_type: number | null;
  handle: string | null;
}

function getChat(db: ChatDb, chatId: number): ChatRow | undefined {
  return db
    .prepare<[number], ChatRow>(
      `SELECT ROWID AS chat_id, display_name, chat_identifier, style
         FROM chat
        WHERE ROWID = ?`,
    )
    .get(chatId);
}

function getDayMessages(db: ChatDb, chatId: number, mmDd: string): DayMessageRow[] {
  return db
    .prepare<[number, string], DayMessageRow>(
      `SELECT m.ROWID AS message_id,
              m.guid,
              m.text,
              m.attributedBody,
              m.is_from_me,
              m.date,
              strftime('%Y', ${LOCAL_MESSAGE_DATETIME_SQL}) AS year,
              m.date_read,
              m.associated_message_guid,
              m.associated_message_type,
              h.id AS handle
         FROM message m
         JOIN chat_message_join cmj ON cmj.message_id = m.ROWID
         LEFT JOIN handle h ON h.ROWID = m.handle_id
        WHERE cmj.chat_id = ?
          AND strftime('%m-%d', ${LOCAL_MESSAGE_DATETIME_SQL}) = ?
        ORDER BY m.date ASC`,
    )
    .all(chatId, mmDd);
}

/** Group messages by year, oldest year first, keeping their order within a year. */
export function groupByYear(messages: readonly Message[]): YearGroup[] {
  const groups = new Map<number, Message[]>();
  for (const message of messages) {
    const group = groups.get(message.year);
    if (group) {
      group.push(message);
    } else {
      groups.set(message.year, [message]);
    }
  }
  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, yearMessages]) => ({ year, messages: yearMessages }));
}

/**
 * Messages of chat `chatId` on `month`/`day` across all years, grouped by
 * year. Returns null when the chat does not exist. A message whose `date`
 * is unset (0) keeps `date: null` under the year SQLite gives it, matching
 * the listing's `years`. `sender` is left null;
 * callers resolve it against their contact book.
 */
export function getMessagesForChatOnDay(
  db: ChatDb,
  chatId: number,
  month: number,
  day: number,
  log: Logger,
): ConversationTimeline | null {
  const chat = getChat(db, chatId);
  if (!chat) {
    return null;
  }

  const mmDd = monthDayKey(month, day);
  const handles = orDefault<string[]>(`handles:${chatId}`, [], () => getChatHandles(db, chatId), log);
  const rows = getDayMessages(db, chatId, mmDd);

  const tapbacksByGuid = new Map<string, Tapback[]>();
  const primary: DayMessageRow[] = [];

  for (const row of rows) {
    const kind = classifyMessage(row.associated_message_type, row.associated_message_guid);
    switch (kind.kind) {
      case 'tapback': {
        const tapback: Tapback = {
          type: kind.type,
          emoji: TAPBACK_EMOJI[kind.type],
          isFromMe: row.is_from_me === 1,
          targetGuid: kind.targetGuid,
        };
        const existing = tapbacksByGuid.get(kind.targetGuid);
        if (existing) {
          existing.push(tapback);
        } else {
          tapbacksByGuid.set(kind.targetGuid, [tapback]);
        }
        break;
      }
      case 'retraction':
        break;
      case 'message':
        primary.push(row);
        break;
    }
  }

  const messages: Message[] = [];
  for (const row of primary) {
    messages.push({
      id: row.message_id,
      guid: row.guid,
      text: messageText(row.text, row.attributedBody),
      isFromMe: row.is_from_me === 1,
      date: toLocalIso(fromArchiveEpoch(row.date)),
      dateRead: toLocalIso(fromArchiveEpoch(row.date_read)),
      year: Number.parseInt(row.year, 10),
      handle: row.handle,
      sender: null,
      attachments: orDefault<Attachment[]>(
        `attachments:${row.message_id}`,
        [],
        () => getAttachmentsForMessage(db, row.message_id),
        log,
      ),
      tapbacks: tapbacksByGuid.get(row.guid) ?? [],
    });
  }

  log.debug(
    { chatId, mmDd, rows: rows.length, messages: messages.length, reactedTo: tapbacksByGuid.size },
    'Built day timeline',
  );

  return {
    chatId: chat.chat_id,
    displayName: chat.display_name || chat.chat_identifier || '',
    handles,
    isGroup: (chat.style ?? 0) === GROUP_CHAT_STYLE,
    yearGroups: groupByYear(messages),
  };
}
