/**
 * =============================================================================
 * CACHE SERVICE - In-Memory Caching Layer
 * =============================================================================
 *
 * Key/value cache with optional per-entry TTL and JSON helpers.
 * Used by the geo service to remember geocoding outcomes (including misses)
 * so uncommon place names do not hit the external geocoder repeatedly.
 *
 * FOR BACKEND DEVELOPERS:
 * - Construct a CacheService per concern (keys are namespaced by prefix)
 * - Use getJSON()/setJSON() for structured values
 *
 * @module cache.service
 * =============================================================================
 */

import { logger } from './logger.service';

// =============================================================================
// CACHE INTERFACE
// =============================================================================

export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  has(key: string): Promise<boolean>;
  clear(): Promise<void>;
  size(): number;
}

// =============================================================================
// IN-MEMORY CACHE
// =============================================================================

export class InMemoryCache implements CacheStore {
  private store = new Map<string, { value: string; expiresAt?: number }>();
  private cleanupTimer: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = 60000) {
    // Periodic sweep of expired entries; unref'd so it never holds the process open
    this.cleanupTimer = setInterval(() => this.cleanup(), cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const entry: { value: string; expiresAt?: number } = { value };
    if (ttlSeconds && ttlSeconds > 0) {
      entry.expiresAt = Date.now() + (ttlSeconds * 1000);
    }
    this.store.set(key, entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt && now > entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`Cache cleanup: removed ${cleaned} expired entries`);
    }
  }
}

// =============================================================================
// CACHE SERVICE
// =============================================================================

export class CacheService {
  constructor(
    private readonly prefix: string,
    private readonly store: CacheStore = new InMemoryCache()
  ) {}

  private key(key: string): string {
    return `${this.prefix}:${key}`;
  }

  async has(key: string): Promise<boolean> {
    return this.store.has(this.key(key));
  }

  /**
   * Parsed JSON value, or undefined when the key is absent.
   * A stored `null` comes back as `null`.
   */
  async getJSON(key: string): Promise<unknown> {
    const raw = await this.store.get(this.key(key));
    if (raw === null) return undefined;

    try {
      return JSON.parse(raw);
    } catch (error) {
      logger.warn(`Cache entry ${this.key(key)} is not valid JSON, dropping it`, {
        error: error instanceof Error ? error.message : String(error)
      });
      await this.store.delete(this.key(key));
      return undefined;
    }
  }

  async setJSON(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    await this.store.set(this.key(key), JSON.stringify(value), ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(this.key(key));
  }

  size(): number {
    return this.store.size();
  }
}
