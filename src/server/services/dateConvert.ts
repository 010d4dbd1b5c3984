/**
 * Apple Messages date conversion utilities.
 *
 * Apple's Core Data timestamps (used in chat.db) are measured in
 * nanoseconds from 2001-01-01 00:00:00 UTC, the "Apple epoch". A stored
 * value of 0 means "never" (e.g. an unread message's `date_read`).
 */

import type { MonthDay } from '../types/index.js';

/** Seconds between Unix epoch (1970-01-01) and Apple epoch (2001-01-01). */
export const APPLE_EPOCH_OFFSET = 978_307_200;

const NANOSECONDS = 1_000_000_000;

/**
 * SQL expression yielding the local wall-clock datetime of `message.date`
 * for a message aliased as `m`. Used for all day/year predicates so the
 * store and the conversion helpers agree on the local calendar.
 */
export const LOCAL_MESSAGE_DATETIME_SQL =
  `datetime(m.date / ${NANOSECONDS} + ${APPLE_EPOCH_OFFSET}, 'unixepoch', 'localtime')`;

/**
 * Convert an Apple timestamp (nanoseconds) to Unix seconds. Returns null
 * for a missing or zero timestamp.
 */
export function fromArchiveEpoch(appleTimestamp: number | null | undefined): number | null {
  if (appleTimestamp === null || appleTimestamp === undefined || appleTimestamp === 0) {
    return null;
  }
  return appleTimestamp / NANOSECONDS + APPLE_EPOCH_OFFSET;
}

/** Convert Unix seconds to an Apple timestamp in nanoseconds. */
export function toArchiveEpoch(unixSeconds: number | null | undefined): number | null {
  if (unixSeconds === null || unixSeconds === undefined) {
    return null;
  }
  return (unixSeconds - APPLE_EPOCH_OFFSET) * NANOSECONDS;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render Unix seconds as a local-time ISO 8601 string without an offset,
 * e.g. `2024-03-15T10:00:00`. Milliseconds are appended only when non-zero.
 */
export function toLocalIso(unixSeconds: number | null | undefined): string | null {
  if (unixSeconds === null || unixSeconds === undefined) {
    return null;
  }
  const date = new Date(Math.round(unixSeconds * 1000));
  const iso =
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const ms = date.getMilliseconds();
  return ms === 0 ? iso : `${iso}.${pad(ms, 3)}`;
}

/** Zero-padded "MM-DD" key matching SQLite's `strftime('%m-%d', ...)`. */
export function monthDayKey(month: number, day: number): string {
  return `${pad(month)}-${pad(day)}`;
}

/** The current local calendar day. */
export function todayMonthDay(now: Date = new Date()): MonthDay {
  return { month: now.getMonth() + 1, day: now.getDate() };
}
