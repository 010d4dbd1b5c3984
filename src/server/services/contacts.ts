/**
 * Contact name resolution for message handles.
 *
 * Handles in chat.db are raw phone numbers ("+14155552671") or email
 * addresses. A ContactBook maps them to names: phones keyed by their last
 * ten digits, emails by their lowercased address.
 */

/** Strip everything but digits and keep at most the last ten. */
export function normalizePhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  return digits.length > 10 ? digits.slice(-10) : digits;
}

/**
 * Whether a chat display name is really a raw identifier: a phone number,
 * a bare digit string or a "chat123…" identifier.
 */
export function looksLikeIdentifier(name: string): boolean {
  if (name.length === 0) return true;
  const stripped = name.trim();
  if (stripped.startsWith('+')) return true;
  if (/^\d+$/.test(stripped.replace(/[-() ]/g, ''))) return true;
  return /^chat\d+$/.test(stripped);
}

const MAX_GROUP_NAMES = 4;

export class ContactBook {
  constructor(private readonly entries: ReadonlyMap<string, string> = new Map()) {}

  get size(): number {
    return this.entries.size;
  }

  /** Contact name for a handle, or the handle itself when unknown. */
  resolveName(handle: string): string {
    if (!handle) {
      return handle;
    }

    if (handle.includes('@')) {
      return this.entries.get(handle.toLowerCase()) ?? handle;
    }

    const normalized = normalizePhone(handle);
    if (normalized) {
      return this.entries.get(normalized) ?? handle;
    }
    return handle;
  }

  /** Human-friendly name for a chat. */
  resolveConversationName(displayName: string, handles: readonly string[], isGroup: boolean): string {
    if (displayName && !looksLikeIdentifier(displayName)) {
      return displayName;
    }

    if (handles.length === 0) {
      if (displayName) {
        const resolved = this.resolveName(displayName);
        if (resolved !== displayName) {
          return resolved;
        }
      }
      return displayName || 'Unknown';
    }

    const names = handles.map((handle) => this.resolveName(handle));
    if (isGroup) {
      const shown = names.slice(0, MAX_GROUP_NAMES).join(', ');
      return names.length > MAX_GROUP_NAMES ? `${shown}...` : shown;
    }
    return names[0];
  }
}

/**
 * Getter that builds the ContactBook on first use and hands out the same
 * instance for the rest of the process.
 */
export function lazyContactBook(load: () => ContactBook): () => ContactBook {
  let book: ContactBook | undefined;
  return () => {
    book ??= load();
    return book;
  };
}
