import type { TapbackType } from '../types/index.js';

/** Emoji shown for each tapback code. */
export const TAPBACK_EMOJI: Readonly<Record<TapbackType, string>> = {
  2000: '\u2764\uFE0F', // loved
  2001: '\u{1F44D}', // liked
  2002: '\u{1F44E}', // disliked
  2003: '\u{1F602}', // laughed
  2004: '\u203C\uFE0F', // emphasized
  2005: '\u2753', // questioned
};

/** Prefixes Messages puts in front of `associated_message_guid`. */
const GUID_PREFIXES = ['p:0/', 'p:1/', 'bp:'] as const;

/** Message kinds by `associated_message_type`. */
export type MessageKind =
  | { kind: 'tapback'; type: TapbackType; targetGuid: string }
  | { kind: 'retraction' }
  | { kind: 'message' };

/** Remove the first matching part-index prefix from a referenced guid. */
export function stripGuidPrefix(guid: string): string {
  const prefix = GUID_PREFIXES.find((p) => guid.startsWith(p));
  return prefix ? guid.slice(prefix.length) : guid;
}

function isTapbackType(value: number): value is TapbackType {
  return value >= 2000 && value <= 2005;
}

/**
 * 2000–2005 add a reaction, 3000 and above remove one; everything else is
 * an ordinary message.
 */
export function classifyMessage(
  associatedType: number | null,
  associatedGuid: string | null,
): MessageKind {
  const type = associatedType ?? 0;
  if (isTapbackType(type)) {
    return { kind: 'tapback', type, targetGuid: stripGuidPrefix(associatedGuid ?? '') };
  }
  if (type >= 3000) {
    return { kind: 'retraction' };
  }
  return { kind: 'message' };
}
