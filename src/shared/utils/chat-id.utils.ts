/**
 * =============================================================================
 * CHAT ID UTILITIES - Canonical chat identifiers
 * =============================================================================
 *
 * One chat can show up under several numeric encodings:
 *
 *   channel / supergroup   -1001234567890   (marked)
 *                           1001234567890   (marked, sign lost)
 *                           1234567890      (bare channel id)
 *                          -1234567890      (bare id, negated)
 *   basic group            -4567            (marked)
 *                           4567            (bare)
 *   user                    777             (bare)
 *
 * The canonical handle is always the marked id as a string. Every ingestion
 * boundary (incoming messages, stored subscriptions, callback payloads)
 * converts through here before comparing ids.
 * =============================================================================
 */

export type ChatKind = 'channel' | 'group' | 'user';

export type RawChatId = string | number | bigint;

const CHANNEL_PREFIX = '-100';

function digitsOf(raw: RawChatId): string {
  return String(raw).trim();
}

/**
 * Marked id for a chat, given its bare id and kind
 */
export function markedChatId(bareId: RawChatId, kind: ChatKind): string {
  const bare = digitsOf(bareId).replace(/^-/, '');
  switch (kind) {
    case 'channel':
      return `${CHANNEL_PREFIX}${bare}`;
    case 'group':
      return `-${bare}`;
    case 'user':
      return bare;
  }
}

/**
 * Every representation a marked id may arrive in, canonical first
 */
export function chatIdVariants(id: RawChatId): string[] {
  const value = digitsOf(id);

  if (value.startsWith(CHANNEL_PREFIX)) {
    const bare = value.slice(CHANNEL_PREFIX.length);
    return [value, value.slice(1), bare, `-${bare}`];
  }

  if (value.startsWith('-')) {
    return [value, value.slice(1)];
  }

  return [value];
}

/**
 * Loose equality across encodings of the same chat
 */
export function chatIdsMatch(a: RawChatId, b: RawChatId): boolean {
  const left = digitsOf(a);
  const right = digitsOf(b);
  if (left === right) return true;
  return chatIdVariants(left).includes(right) || chatIdVariants(right).includes(left);
}

/**
 * Internal id used in private message links (t.me/c/<id>/<msg>)
 */
export function linkChatId(id: RawChatId): string {
  const value = digitsOf(id);
  if (value.startsWith(CHANNEL_PREFIX)) return value.slice(CHANNEL_PREFIX.length);
  return value.replace(/^-/, '');
}

/**
 * Bijection between every known variant and the canonical handle.
 * Rebuilt once per account refresh from the chats visible to that account.
 */
export class ChatIdIndex<TChat = unknown> {
  private readonly byVariant = new Map<string, string>();
  private readonly chats = new Map<string, TChat>();

  add(canonicalId: string, chat: TChat): void {
    this.chats.set(canonicalId, chat);
    for (const variant of chatIdVariants(canonicalId)) {
      // First registration wins; the canonical form always maps to itself
      if (!this.byVariant.has(variant) || variant === canonicalId) {
        this.byVariant.set(variant, canonicalId);
      }
    }
  }

  /**
   * Canonical handle for any variant, or undefined when the chat is unknown
   */
  canonical(id: RawChatId): string | undefined {
    return this.byVariant.get(digitsOf(id));
  }

  get(id: RawChatId): TChat | undefined {
    const canonicalId = this.canonical(id);
    return canonicalId === undefined ? undefined : this.chats.get(canonicalId);
  }

  get size(): number {
    return this.chats.size;
  }
}
