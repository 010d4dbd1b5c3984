/** Core domain types for the On This Day web service. */

import type pino from 'pino';

/** Logger accepted by services; both pino loggers and Fastify request loggers fit. */
export type Logger = pino.BaseLogger;

/** Calendar day (local time) used to select messages across all years. */
export interface MonthDay {
  /** 1–12. */
  month: number;
  /** 1–31. */
  day: number;
}

/** A file attached to a message. */
export interface Attachment {
  /** ROWID of the attachment row in chat.db. */
  id: number;
  /** Transfer name, else the raw filename, else "attachment". */
  filename: string;
  mimeType: string | null;
  /** API path that streams the attachment bytes. */
  url: string;
}

/** Tapback reaction codes as stored in `associated_message_type`. */
export type TapbackType = 2000 | 2001 | 2002 | 2003 | 2004 | 2005;

/** A tapback (reaction) bound to a message on the same day. */
export interface Tapback {
  type: TapbackType;
  emoji: string;
  /** Whether the reaction was sent by the archive owner. */
  isFromMe: boolean;
  /** Guid of the message the reaction targets, prefix token removed. */
  targetGuid: string;
}

/** A single primary (non-reaction) message. */
export interface Message {
  /** ROWID of the message row. */
  id: number;
  guid: string;
  /** Message body text. Null for attachment-only or undecodable messages. */
  text: string | null;
  /** Whether this message was sent by the local user. */
  isFromMe: boolean;
  /** Local ISO 8601 timestamp of when the message was sent or received. */
  date: string | null;
  /** Local ISO 8601 timestamp of when the message was read, if ever. */
  dateRead: string | null;
  /** Local calendar year of `date`; 2001 when the date is unset. */
  year: number;
  /** Raw sender handle (phone number or email). */
  handle: string | null;
  /** Resolved sender name; "Me" for own messages without a handle. */
  sender: string | null;
  attachments: Attachment[];
  tapbacks: Tapback[];
}

/** Messages of one year, in chronological order. */
export interface YearGroup {
  year: number;
  messages: Message[];
}

/** A chat thread with activity on the requested day. */
export interface ConversationSummary {
  chatId: number;
  /** Resolved display name (contact names for unnamed chats). */
  displayName: string;
  /** Participant handles as listed by chat_handle_join. */
  handles: string[];
  isGroup: boolean;
  /** Raw chat style code (43 marks a group chat). */
  style: number;
  /** Distinct messages on the day across all years. */
  messageCount: number;
  /** Years with activity on the day, most recent first. */
  years: number[];
  /** Up to 100 characters of the latest message on the day. */
  lastMessagePreview: string;
  /** Local ISO 8601 timestamp of the latest message on the day. */
  lastMessageDate: string | null;
}

/** Year-grouped messages of one chat on the requested day. */
export interface ConversationTimeline {
  chatId: number;
  displayName: string;
  handles: string[];
  isGroup: boolean;
  /** Year groups, oldest year first. */
  yearGroups: YearGroup[];
}

/** Response body of the conversation listing. */
export interface ConversationListing extends MonthDay {
  conversations: ConversationSummary[];
}

/** A resolved attachment file ready to be streamed. */
export interface AttachmentFile {
  path: string;
  mimeType: string | null;
}

/** Structured error response format. */
export interface ErrorResponse {
  error: {
    /** Machine-readable error code (e.g. NOT_FOUND, STORE_UNAVAILABLE). */
    code: string;
    /** Human-readable error message. */
    message: string;
    /** Optional additional details for debugging. */
    details?: unknown;
  };
}
