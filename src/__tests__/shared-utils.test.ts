/**
 * =============================================================================
 * SHARED UTILITIES - Tests
 * =============================================================================
 *
 * Chat id canonicalization, the recency set and the per-account session store.
 * =============================================================================
 */

import {
  ChatIdIndex,
  chatIdVariants,
  chatIdsMatch,
  linkChatId,
  markedChatId
} from '../shared/utils/chat-id.utils';
import { RecentSet } from '../shared/utils/recent-set';
import { SessionStore } from '../shared/services/session-store.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// =============================================================================
// CHAT IDS
// =============================================================================

describe('chat id utilities', () => {
  it('should build marked ids per chat kind', () => {
    expect(markedChatId('1700000001', 'channel')).toBe('-1001700000001');
    expect(markedChatId('-4567', 'group')).toBe('-4567');
    expect(markedChatId(777, 'user')).toBe('777');
  });

  it('should list every encoding of a channel id, canonical first', () => {
    expect(chatIdVariants('-1001700000001')).toEqual(['-1001700000001', '1001700000001', '1700000001', '-1700000001']);
    expect(chatIdVariants('-4567')).toEqual(['-4567', '4567']);
    expect(chatIdVariants('777')).toEqual(['777']);
  });

  it('should compare ids across encodings', () => {
    expect(chatIdsMatch('1700000001', '-1001700000001')).toBe(true);
    expect(chatIdsMatch(BigInt('-1001700000001'), '-1700000001')).toBe(true);
    expect(chatIdsMatch('-4567', 4567)).toBe(true);
    expect(chatIdsMatch('777', '778')).toBe(false);
  });

  it('should derive the private link id', () => {
    expect(linkChatId('-1001700000001')).toBe('1700000001');
    expect(linkChatId('-4567')).toBe('4567');
  });

  describe('ChatIdIndex', () => {
    it('should resolve any variant to the canonical id', () => {
      const index = new ChatIdIndex<{ title: string }>();
      index.add('-1001700000001', { title: 'Межгород' });

      expect(index.canonical('1700000001')).toBe('-1001700000001');
      expect(index.canonical(1001700000001)).toBe('-1001700000001');
      expect(index.get('-1700000001')).toEqual({ title: 'Межгород' });
      expect(index.canonical('999')).toBeUndefined();
      expect(index.get('999')).toBeUndefined();
      expect(index.size).toBe(1);
    });

    it('should keep the first registration of a shared variant', () => {
      const index = new ChatIdIndex<string>();
      index.add('-4567', 'group');
      index.add('-1004567', 'channel');

      expect(index.canonical('-4567')).toBe('-4567');
      expect(index.canonical('4567')).toBe('-4567');
      expect(index.canonical('1004567')).toBe('-1004567');
      expect(index.size).toBe(2);
    });
  });
});

// =============================================================================
// RECENT SET
// =============================================================================

describe('RecentSet', () => {
  it('should report each key as new once', () => {
    const recent = new RecentSet(10);
    expect(recent.markIfNew('a')).toBe(true);
    expect(recent.markIfNew('a')).toBe(false);
    expect(recent.has('a')).toBe(true);
  });

  it('should evict the oldest key when full', () => {
    const recent = new RecentSet(2);
    recent.markIfNew('a');
    recent.markIfNew('b');
    recent.markIfNew('c');

    expect(recent.has('a')).toBe(false);
    expect(recent.has('b')).toBe(true);
    expect(recent.size).toBe(2);

    expect(recent.markIfNew('a')).toBe(true);
    expect(recent.has('b')).toBe(false);
  });

  it('should forget everything on clear', () => {
    const recent = new RecentSet(2);
    recent.markIfNew('a');
    recent.clear();
    expect(recent.size).toBe(0);
    expect(recent.markIfNew('a')).toBe(true);
  });

  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new RecentSet(0)).toThrow(RangeError);
    expect(() => new RecentSet(1.5)).toThrow('RecentSet capacity must be a positive integer, got 1.5');
  });
});

// =============================================================================
// SESSION STORE
// =============================================================================

describe('SessionStore', () => {
  let clock: number;
  let store: SessionStore<string>;

  beforeEach(() => {
    clock = 1_000_000;
    store = new SessionStore<string>('test', 1000, () => clock);
  });

  it('should refuse a second session while one is live', () => {
    expect(store.begin('driver-1', 'first')).toBe(true);
    expect(store.begin('driver-1', 'second')).toBe(false);
    expect(store.get('driver-1')).toBe('first');
    expect(store.begin('driver-2', 'other')).toBe(true);
  });

  it('should expire a session at its deadline', () => {
    store.begin('driver-1', 'first');

    clock += 999;
    expect(store.get('driver-1')).toBe('first');

    clock += 1;
    expect(store.get('driver-1')).toBeUndefined();
    expect(store.size).toBe(0);
    expect(store.begin('driver-1', 'again')).toBe(true);
  });

  it('should end a session explicitly', () => {
    store.begin('driver-1', 'first');
    store.end('driver-1');
    expect(store.get('driver-1')).toBeUndefined();
  });
});
