/**
 * =============================================================================
 * SESSION STORE - Per-account transient state
 * =============================================================================
 *
 * Holds short-lived per-account state (a reply in flight, an input step)
 * with explicit entry and exit and a hard expiry. Each entry is owned by one
 * account id; an expired entry reads as absent and is removed on access.
 *
 * USAGE:
 * ```typescript
 * const pending = new SessionStore<PendingReply>('quick-reply', 60_000);
 * if (!pending.begin(driverId, { routeKey })) return; // already in progress
 * try { ... } finally { pending.end(driverId); }
 * ```
 * =============================================================================
 */

import { logger } from './logger.service';

interface SessionEntry<T> {
  state: T;
  expiresAt: number;
}

export class SessionStore<T> {
  private readonly entries = new Map<string, SessionEntry<T>>();

  constructor(
    private readonly name: string,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Enter a session for the account.
   * @returns false when a live session already exists
   */
  begin(accountId: string, state: T): boolean {
    if (this.get(accountId) !== undefined) {
      return false;
    }
    this.entries.set(accountId, { state, expiresAt: this.now() + this.ttlMs });
    return true;
  }

  get(accountId: string): T | undefined {
    const entry = this.entries.get(accountId);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(accountId);
      logger.debug(`[SessionStore:${this.name}] Session expired`, { accountId });
      return undefined;
    }
    return entry.state;
  }

  end(accountId: string): void {
    this.entries.delete(accountId);
  }

  get size(): number {
    return this.entries.size;
  }
}
