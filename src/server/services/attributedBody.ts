/**
 * Plain-text recovery from `message.attributedBody` blobs.
 *
 * Newer macOS releases often leave `message.text` empty and store the body
 * only as a serialised NSAttributedString (a "streamtyped" archive). A full
 * decoder is out of scope; instead the string payload is located after the
 * NSString class marker, where it is stored as
 *
 *     ... NSString <≤20 bytes> 0x01 0x2B <length> <utf-8 bytes>
 *
 * with `<length>` one of:
 *   - 0x01–0x7F           the length itself
 *   - 0x81 <u8>           one length byte
 *   - 0x84 <u32 BE>       four length bytes
 *
 * When that fails, the longest printable byte run is used instead.
 */

import { cleanExtractedText } from './sanitize.js';

const STRING_MARKERS = [Buffer.from('NSString'), Buffer.from('NSMutableString')];

/** 0x01 '+' precedes the length-prefixed payload. */
const PAYLOAD_CONTROL = [0x01, 0x2b] as const;

/** How far past the class marker the control sequence may appear. */
const CONTROL_SEARCH_WINDOW = 20;

const MAX_PAYLOAD_LENGTH = 100_000;

/** The fallback scan skips the archive header. */
const SCAN_START_OFFSET = 50;

const MIN_PRINTABLE_RATIO = 0.5;

/** Outcome of locating and decoding the string payload. */
export type StringPayloadResult =
  | { kind: 'found'; text: string }
  | { kind: 'markerNotFound' }
  | { kind: 'malformedLength' }
  | { kind: 'decodeFailed' };

type LengthPrefix =
  | { ok: true; length: number; start: number }
  | { ok: false };

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });
const lenientUtf8 = new TextDecoder('utf-8', { fatal: false });

function findMarkerEnd(blob: Buffer): number {
  for (const marker of STRING_MARKERS) {
    const index = blob.indexOf(marker);
    if (index !== -1) {
      return index + marker.length;
    }
  }
  return -1;
}

function findControl(blob: Buffer, from: number): number {
  const end = Math.min(from + CONTROL_SEARCH_WINDOW, blob.length - 2);
  for (let pos = from; pos < end; pos++) {
    if (blob[pos] === PAYLOAD_CONTROL[0] && blob[pos + 1] === PAYLOAD_CONTROL[1]) {
      return pos;
    }
  }
  return -1;
}

/** Decode the length prefix at `pos`. */
export function readLengthPrefix(blob: Buffer, pos: number): LengthPrefix {
  if (pos >= blob.length) {
    return { ok: false };
  }
  const lead = blob[pos];
  if (lead >= 0x01 && lead <= 0x7f) {
    return { ok: true, length: lead, start: pos + 1 };
  }
  if (lead === 0x81 && pos + 1 < blob.length) {
    return { ok: true, length: blob[pos + 1], start: pos + 2 };
  }
  if (lead === 0x84 && pos + 4 < blob.length) {
    return { ok: true, length: blob.readUInt32BE(pos + 1), start: pos + 5 };
  }
  return { ok: false };
}

/** Locate the NSString payload and decode it as strict UTF-8. */
export function parseStringPayload(blob: Buffer): StringPayloadResult {
  const markerEnd = findMarkerEnd(blob);
  if (markerEnd === -1) {
    return { kind: 'markerNotFound' };
  }

  const control = findControl(blob, markerEnd);
  if (control === -1) {
    return { kind: 'markerNotFound' };
  }

  const prefix = readLengthPrefix(blob, control + PAYLOAD_CONTROL.length);
  if (!prefix.ok) {
    return { kind: 'malformedLength' };
  }
  const { length, start } = prefix;
  if (length <= 0 || length > MAX_PAYLOAD_LENGTH || start + length > blob.length) {
    return { kind: 'malformedLength' };
  }

  const payload = blob.subarray(start, start + length);
  try {
    return { kind: 'found', text: strictUtf8.decode(payload) };
  } catch (err) {
    if (err instanceof TypeError) {
      return { kind: 'decodeFailed' };
    }
    throw err;
  }
}

function isRunByte(byte: number): boolean {
  return (byte >= 0x20 && byte <= 0x7e) || byte === 0x09 || byte === 0x0a || byte === 0x0d || byte >= 0xc0;
}

// Control, format, surrogate, private-use, unassigned and non-space separators.
const NON_PRINTABLE = /[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}]|(?! )\p{Zs}/u;

/** Share of printable characters (tab, CR and LF count as printable). */
export function printableRatio(text: string): number {
  const chars = Array.from(text);
  if (chars.length === 0) {
    return 0;
  }
  const printable = chars.filter(
    (c) => c === '\t' || c === '\n' || c === '\r' || !NON_PRINTABLE.test(c),
  ).length;
  return printable / chars.length;
}

/** Longest text-like byte run past the archive header, or null. */
export function scanLongestTextRun(blob: Buffer): string | null {
  let best = '';
  let bestLength = 0;
  let i = SCAN_START_OFFSET;

  while (i < blob.length) {
    const runStart = i;
    while (i < blob.length && isRunByte(blob[i])) {
      i++;
    }
    if (i > runStart) {
      const chunk = lenientUtf8.decode(blob.subarray(runStart, i)).replace(/\uFFFD/g, '').trim();
      const length = Array.from(chunk).length;
      if (length > bestLength && printableRatio(chunk) > MIN_PRINTABLE_RATIO) {
        best = chunk;
        bestLength = length;
      }
    }
    i++;
  }

  return bestLength > 0 ? best : null;
}

/**
 * Best-effort plain text of an attributedBody blob. Never throws; returns
 * null when nothing text-like can be recovered.
 */
export function extractText(blob: unknown): string | null {
  // Malformed rows can hold an INTEGER, REAL or TEXT value in the blob column.
  if (!Buffer.isBuffer(blob) || blob.length === 0) {
    return null;
  }

  const payload = parseStringPayload(blob);
  if (payload.kind === 'found' && payload.text.length > 0) {
    return cleanExtractedText(payload.text);
  }

  const run = scanLongestTextRun(blob);
  return run === null ? null : cleanExtractedText(run);
}
