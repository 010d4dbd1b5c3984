/**
 * The "on this day" operations the HTTP layer exposes: each call opens
 * its own read-only chat.db connection, runs the reconstruction and
 * resolves handles to contact names.
 */

import { existsSync } from 'node:fs';
import pino from 'pino';

import { NotFoundError } from '../errors.js';
import { getAttachmentFile } from './attachments.js';
import { withChatDb } from './chatDb.js';
import type { ContactBook } from './contacts.js';
import { getConversationsOnDay } from './conversations.js';
import { todayMonthDay } from './dateConvert.js';
import { convertHeicToJpeg, isHeic } from './imageConvert.js';
import type { CommandRunner } from './imageConvert.js';
import { getMessagesForChatOnDay } from './timeline.js';
import type {
  AttachmentFile,
  ConversationListing,
  ConversationTimeline,
  Logger,
  MonthDay,
} from '../types/index.js';

export interface OnThisDayOptions {
  chatDbPath: string;
  /** Contact book getter, typically from lazyContactBook(). */
  contacts: () => ContactBook;
  imageCacheDir: string;
  imageConvertTimeoutMs: number;
  logger?: Logger;
  /** Overrides the `sips` invocation (tests). */
  runCommand?: CommandRunner;
}

/** Partial day; missing parts default to today's local date. */
export type DayQuery = Partial<MonthDay>;

function resolveDay(query: DayQuery, now: Date): MonthDay {
  const today = todayMonthDay(now);
  return { month: query.month ?? today.month, day: query.day ?? today.day };
}

export class OnThisDayService {
  private readonly log: Logger;

  constructor(private readonly options: OnThisDayOptions) {
    this.log = options.logger ?? pino({ name: 'on-this-day' });
  }

  /** Conversations active on the day, with display names resolved. */
  listConversations(query: DayQuery = {}, log: Logger = this.log, now: Date = new Date()): ConversationListing {
    const { month, day } = resolveDay(query, now);
    const book = this.options.contacts();

    const conversations = withChatDb(this.options.chatDbPath, (db) =>
      getConversationsOnDay(db, month, day, log),
    ).map((conversation) => ({
      ...conversation,
      displayName: book.resolveConversationName(
        conversation.displayName,
        conversation.handles,
        conversation.isGroup,
      ),
    }));

    return { month, day, conversations };
  }

  /**
   * Year-grouped messages of a chat on the day, with the chat name and
   * each sender resolved. Throws NotFoundError for an unknown chat.
   */
  getTimeline(
    chatId: number,
    query: DayQuery = {},
    log: Logger = this.log,
    now: Date = new Date(),
  ): ConversationTimeline {
    const { month, day } = resolveDay(query, now);
    const timeline = withChatDb(this.options.chatDbPath, (db) =>
      getMessagesForChatOnDay(db, chatId, month, day, log),
    );
    if (!timeline) {
      throw new NotFoundError(`Chat ${chatId} not found`);
    }

    const book = this.options.contacts();
    return {
      ...timeline,
      displayName: book.resolveConversationName(timeline.displayName, timeline.handles, timeline.isGroup),
      yearGroups: timeline.yearGroups.map((group) => ({
        ...group,
        messages: group.messages.map((message) => ({
          ...message,
          sender: message.handle
            ? book.resolveName(message.handle)
            : message.isFromMe
              ? 'Me'
              : null,
        })),
      })),
    };
  }

  /**
   * File to serve for an attachment. HEIC images are converted to JPEG
   * when possible. Throws NotFoundError when the row or file is missing.
   */
  async getAttachment(attachmentId: number, log: Logger = this.log): Promise<AttachmentFile> {
    const file = withChatDb(this.options.chatDbPath, (db) => getAttachmentFile(db, attachmentId));
    if (!file || !existsSync(file.path)) {
      throw new NotFoundError(`Attachment ${attachmentId} not found`);
    }

    if (isHeic(file.mimeType, file.path)) {
      const converted = await convertHeicToJpeg(file.path, attachmentId, {
        cacheDir: this.options.imageCacheDir,
        timeoutMs: this.options.imageConvertTimeoutMs,
        logger: log,
        run: this.options.runCommand,
      });
      if (converted) {
        return { path: converted, mimeType: 'image/jpeg' };
      }
    }
    return file;
  }
}
