/**
 * =============================================================================
 * DATABASE SERVICE - Persistent JSON File Storage
 * =============================================================================
 *
 * Document store holding drivers, their group subscriptions and monitoring
 * sessions, and the order / notification / group-link bookkeeping the
 * pipeline writes.
 *
 * - With a file path: loads on start, writes are debounced (100ms) and
 *   flushed on shutdown.
 * - With `null`: purely in memory (tests, dry runs).
 *
 * Unique keys are enforced here the way a relational store would with a
 * unique index: orders by source link, group links by
 * (routeKey, driver, sourceLink), subscriptions by (driver, group).
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logger.service';
import { chatIdsMatch } from '../utils/chat-id.utils';
import { DRIVER_DEFAULTS } from '../../core/constants';
import type {
  IDataStore,
  AuthorizedAccount,
  BlacklistQuery,
  UpsertResult
} from './repository.interface';

// =============================================================================
// RECORDS
// =============================================================================

export interface BaseRecord {
  id: string;
  createdAt: string;
  updatedAt: string;
}

// Driver - registered through the bot; also the owner of a monitoring account
export interface DriverRecord extends BaseRecord {
  telegramId: number;
  username?: string;
  firstName?: string;
  lat?: number;
  lon?: number;
  cityName?: string;
  radiusKm: number;
  minPrice: number;           // 0 = no floor
  active: boolean;
  isAuthorized: boolean;      // monitoring session is logged in
  isAdmin: boolean;
}

export interface DriverSettingsRecord extends BaseRecord {
  driverId: string;
  quietHoursEnabled: boolean;
  quietHoursStart: string;    // HH:mm, local to the configured timezone
  quietHoursEnd: string;
  busyUntil?: string;         // ISO timestamp
}

export interface GroupSubscriptionRecord extends BaseRecord {
  driverId: string;
  groupId: string;            // canonical (marked) chat id
  title: string;
  username?: string;
  isActive: boolean;
}

export interface MonitorSessionRecord extends BaseRecord {
  driverId: string;
  sessionString: string;
}

export interface OrderRecord extends BaseRecord {
  sourceLink: string;
  pointA: string;
  pointB: string;
  price?: number;
  region?: string;
  sourceGroupId: string;
  sourceGroupTitle: string;
  messageId: number;
  authorId?: string;
  authorUsername?: string;
  text: string;
}

// Handle of a bot message sent to a driver for one route
export interface NotificationRecord extends BaseRecord {
  driverId: string;
  routeKey: string;
  messageId: number;
  sentAt: string;
  /** Group postings seen at or after this instant belong to this notification */
  linksSince: string;
  /** Posting the body was last built from; quick replies go here first */
  groupId: string;
  sourceMessageId: number;
  sourceLink: string;
}

// One group posting folded into a driver's notification for a route
export interface OrderGroupLinkRecord extends BaseRecord {
  driverId: string;
  routeKey: string;
  sourceLink: string;
  groupId: string;
  groupTitle: string;
  messageId: number;
  authorId?: string;
  authorUsername?: string;
  authorFirstName?: string;
  /** When the posting was last folded into a notification */
  seenAt: string;
}

export interface ServiceGroupRecord extends BaseRecord {
  groupId: string;
  title: string;
}

export interface FavoriteRouteRecord extends BaseRecord {
  driverId: string;
  pointA: string;
  pointB: string;
}

export type BlacklistKind = 'author' | 'group';

export interface BlacklistRecord extends BaseRecord {
  driverId: string;
  kind: BlacklistKind;
  value: string;
}

export interface QuickReplyRecord extends BaseRecord {
  driverId: string;
  label: string;
  text: string;
  position: number;
}

export interface OrderResponseRecord extends BaseRecord {
  driverId: string;
  routeKey: string;
  sourceLink: string;
  groupId: string;
  replyText: string;
}

export type DriverStatStatus = 'pending' | 'completed' | 'cancelled';

export interface DriverStatRecord extends BaseRecord {
  driverId: string;
  routeKey: string;
  price?: number;
  status: DriverStatStatus;
}

// Database schema
export interface Database {
  drivers: DriverRecord[];
  driverSettings: DriverSettingsRecord[];
  groupSubscriptions: GroupSubscriptionRecord[];
  monitorSessions: MonitorSessionRecord[];
  orders: OrderRecord[];
  notifications: NotificationRecord[];
  orderGroupLinks: OrderGroupLinkRecord[];
  serviceGroups: ServiceGroupRecord[];
  favoriteRoutes: FavoriteRouteRecord[];
  blacklist: BlacklistRecord[];
  quickReplies: QuickReplyRecord[];
  orderResponses: OrderResponseRecord[];
  driverStats: DriverStatRecord[];
  _meta: {
    version: string;
    lastUpdated: string;
  };
}

export type NewRecord<T extends BaseRecord> = Omit<T, 'id' | 'createdAt' | 'updatedAt'>;

export type DriverInput = Pick<DriverRecord, 'telegramId'> &
  Partial<Omit<NewRecord<DriverRecord>, 'telegramId'>>;

function emptyDatabase(): Database {
  return {
    drivers: [],
    driverSettings: [],
    groupSubscriptions: [],
    monitorSessions: [],
    orders: [],
    notifications: [],
    orderGroupLinks: [],
    serviceGroups: [],
    favoriteRoutes: [],
    blacklist: [],
    quickReplies: [],
    orderResponses: [],
    driverStats: [],
    _meta: {
      version: '1.0.0',
      lastUpdated: new Date().toISOString()
    }
  };
}

function normalizeAuthor(value: string): string {
  return value.trim().replace(/^@/, '').toLowerCase();
}

function stamp<T extends BaseRecord>(fields: NewRecord<T>): NewRecord<T> & BaseRecord {
  const now = new Date().toISOString();
  return { ...fields, id: uuidv4(), createdAt: now, updatedAt: now };
}

/**
 * Database class - handles all reads and writes
 */
export class DatabaseService implements IDataStore {
  private data: Database;
  private saveTimeout: NodeJS.Timeout | null = null;

  constructor(private readonly filePath: string | null) {
    this.data = this.load();
    if (filePath) {
      logger.info(`Database loaded from ${filePath}`, this.getStats());
    }
  }

  /**
   * Load database from file
   */
  private load(): Database {
    if (!this.filePath) return emptyDatabase();

    try {
      if (!fs.existsSync(this.filePath)) {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        const fresh = emptyDatabase();
        this.saveSync(fresh);
        return fresh;
      }

      const parsed: Partial<Database> = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      // Collections added after the file was written start empty
      return { ...emptyDatabase(), ...parsed };
    } catch (error) {
      logger.error('Failed to load database, starting empty', {
        error: error instanceof Error ? error.message : String(error)
      });
      return emptyDatabase();
    }
  }

  /**
   * Save database to file (debounced)
   */
  private save(): void {
    if (!this.filePath) return;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.saveSync(this.data);
    }, 100);
  }

  private saveSync(data: Database): void {
    if (!this.filePath) return;

    try {
      data._meta.lastUpdated = new Date().toISOString();
      fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
    } catch (error) {
      logger.error('Failed to save database', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * Write pending changes now (shutdown)
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    this.saveSync(this.data);
  }

  getStats(): Record<string, number> {
    return {
      drivers: this.data.drivers.length,
      subscriptions: this.data.groupSubscriptions.length,
      orders: this.data.orders.length,
      notifications: this.data.notifications.length
    };
  }

  // ==========================================================================
  // DRIVER OPERATIONS
  // ==========================================================================

  /**
   * Create or update a driver, keyed by Telegram id
   */
  async upsertDriver(input: DriverInput): Promise<DriverRecord> {
    const existing = this.data.drivers.find(d => d.telegramId === input.telegramId);

    if (existing) {
      Object.assign(existing, input, { updatedAt: new Date().toISOString() });
      this.save();
      return existing;
    }

    const driver: DriverRecord = stamp<DriverRecord>({
      radiusKm: DRIVER_DEFAULTS.RADIUS_KM,
      minPrice: DRIVER_DEFAULTS.MIN_PRICE,
      active: true,
      isAuthorized: false,
      isAdmin: false,
      ...input
    });
    this.data.drivers.push(driver);
    this.save();
    return driver;
  }

  async getDriverById(id: string): Promise<DriverRecord | undefined> {
    return this.data.drivers.find(d => d.id === id);
  }

  async getDriverByTelegramId(telegramId: number): Promise<DriverRecord | undefined> {
    return this.data.drivers.find(d => d.telegramId === telegramId);
  }

  /**
   * Active drivers with a known location
   */
  async listActiveDrivers(): Promise<DriverRecord[]> {
    return this.data.drivers.filter(d => d.active && d.lat !== undefined && d.lon !== undefined);
  }

  async listAdmins(): Promise<DriverRecord[]> {
    return this.data.drivers.filter(d => d.active && d.isAdmin);
  }

  async listDriversSubscribedToGroup(groupId: string): Promise<DriverRecord[]> {
    const subscriberIds = new Set(
      this.data.groupSubscriptions
        .filter(s => s.isActive && chatIdsMatch(s.groupId, groupId))
        .map(s => s.driverId)
    );
    return this.data.drivers.filter(d => d.active && subscriberIds.has(d.id));
  }

  async setDriverAuthorized(driverId: string, isAuthorized: boolean): Promise<void> {
    const driver = this.data.drivers.find(d => d.id === driverId);
    if (!driver) return;
    driver.isAuthorized = isAuthorized;
    driver.updatedAt = new Date().toISOString();
    this.save();
  }

  // ==========================================================================
  // GROUP SUBSCRIPTIONS & MONITOR SESSIONS
  // ==========================================================================

  async addGroupSubscription(
    input: Pick<GroupSubscriptionRecord, 'driverId' | 'groupId' | 'title'> & { username?: string }
  ): Promise<GroupSubscriptionRecord> {
    const existing = this.data.groupSubscriptions.find(
      s => s.driverId === input.driverId && chatIdsMatch(s.groupId, input.groupId)
    );
    if (existing) {
      Object.assign(existing, input, { isActive: true, updatedAt: new Date().toISOString() });
      this.save();
      return existing;
    }

    const record: GroupSubscriptionRecord = stamp<GroupSubscriptionRecord>({ ...input, isActive: true });
    this.data.groupSubscriptions.push(record);
    this.save();
    return record;
  }

  async removeGroupSubscription(driverId: string, groupId: string): Promise<boolean> {
    const existing = this.data.groupSubscriptions.find(
      s => s.driverId === driverId && s.isActive && chatIdsMatch(s.groupId, groupId)
    );
    if (!existing) return false;
    existing.isActive = false;
    existing.updatedAt = new Date().toISOString();
    this.save();
    return true;
  }

  async listActiveGroupSubscriptions(accountId: string): Promise<GroupSubscriptionRecord[]> {
    return this.data.groupSubscriptions.filter(s => s.driverId === accountId && s.isActive);
  }

  async isSubscribedToGroup(driverId: string, groupId: string): Promise<boolean> {
    return this.data.groupSubscriptions.some(
      s => s.driverId === driverId && s.isActive && chatIdsMatch(s.groupId, groupId)
    );
  }

  async saveMonitorSession(driverId: string, sessionString: string): Promise<void> {
    const existing = this.data.monitorSessions.find(s => s.driverId === driverId);
    if (existing) {
      existing.sessionString = sessionString;
      existing.updatedAt = new Date().toISOString();
    } else {
      this.data.monitorSessions.push(stamp<MonitorSessionRecord>({ driverId, sessionString }));
    }
    this.save();
  }

  async getMonitorSession(driverId: string): Promise<string | undefined> {
    return this.data.monitorSessions.find(s => s.driverId === driverId)?.sessionString;
  }

  async listAuthorizedAccounts(): Promise<AuthorizedAccount[]> {
    const accounts: AuthorizedAccount[] = [];
    for (const driver of this.data.drivers) {
      if (!driver.active || !driver.isAuthorized) continue;
      const sessionString = await this.getMonitorSession(driver.id);
      if (sessionString) {
        accounts.push({ accountId: driver.id, sessionString });
      }
    }
    return accounts;
  }

  // ==========================================================================
  // ORDERS, NOTIFICATIONS, GROUP LINKS
  // ==========================================================================

  async saveOrder(order: NewRecord<OrderRecord>): Promise<UpsertResult<OrderRecord>> {
    const existing = this.data.orders.find(o => o.sourceLink === order.sourceLink);
    if (existing) return { record: existing, created: false };

    const record: OrderRecord = stamp<OrderRecord>(order);
    this.data.orders.push(record);
    this.save();
    return { record, created: true };
  }

  async getOrderBySourceLink(sourceLink: string): Promise<OrderRecord | undefined> {
    return this.data.orders.find(o => o.sourceLink === sourceLink);
  }

  async saveNotification(input: NewRecord<NotificationRecord>): Promise<NotificationRecord> {
    const record: NotificationRecord = stamp<NotificationRecord>(input);
    this.data.notifications.push(record);
    this.save();
    return record;
  }

  /**
   * Most recent notification for (driver, route) sent at or after `since`
   */
  async findRecentNotification(driverId: string, routeKey: string, since: Date): Promise<NotificationRecord | undefined> {
    let latest: NotificationRecord | undefined;
    for (const n of this.data.notifications) {
      if (n.driverId !== driverId || n.routeKey !== routeKey) continue;
      if (Date.parse(n.sentAt) < since.getTime()) continue;
      if (!latest || Date.parse(n.sentAt) >= Date.parse(latest.sentAt)) {
        latest = n;
      }
    }
    return latest;
  }

  async findNotificationByMessageId(driverId: string, messageId: number): Promise<NotificationRecord | undefined> {
    return this.data.notifications.find(n => n.driverId === driverId && n.messageId === messageId);
  }

  async updateNotification(
    id: string,
    patch: Partial<Pick<NotificationRecord, 'groupId' | 'sourceMessageId' | 'sourceLink'>>
  ): Promise<void> {
    const existing = this.data.notifications.find(n => n.id === id);
    if (!existing) return;
    Object.assign(existing, patch, { updatedAt: new Date().toISOString() });
    this.save();
  }

  /**
   * Insert unless (routeKey, driver, sourceLink) already exists; a repeat
   * only moves seenAt forward
   */
  async addGroupLink(input: NewRecord<OrderGroupLinkRecord>): Promise<UpsertResult<OrderGroupLinkRecord>> {
    const existing = this.data.orderGroupLinks.find(
      l => l.routeKey === input.routeKey && l.driverId === input.driverId && l.sourceLink === input.sourceLink
    );
    if (existing) {
      if (Date.parse(input.seenAt) > Date.parse(existing.seenAt)) {
        existing.seenAt = input.seenAt;
        existing.updatedAt = new Date().toISOString();
        this.save();
      }
      return { record: existing, created: false };
    }

    const record: OrderGroupLinkRecord = stamp<OrderGroupLinkRecord>(input);
    this.data.orderGroupLinks.push(record);
    this.save();
    return { record, created: true };
  }

  /**
   * Links for (driver, route) in insertion order, optionally only those seen
   * at or after `since`
   */
  async listGroupLinks(driverId: string, routeKey: string, since?: string): Promise<OrderGroupLinkRecord[]> {
    const from = since === undefined ? -Infinity : Date.parse(since);
    return this.data.orderGroupLinks.filter(
      l => l.driverId === driverId && l.routeKey === routeKey && Date.parse(l.seenAt) >= from
    );
  }

  // ==========================================================================
  // SERVICE GROUPS
  // ==========================================================================

  async addServiceGroup(groupId: string, title: string): Promise<ServiceGroupRecord> {
    const existing = this.data.serviceGroups.find(g => chatIdsMatch(g.groupId, groupId));
    if (existing) return existing;

    const record: ServiceGroupRecord = stamp<ServiceGroupRecord>({ groupId, title });
    this.data.serviceGroups.push(record);
    this.save();
    return record;
  }

  async isServiceGroup(groupId: string): Promise<boolean> {
    return this.data.serviceGroups.some(g => chatIdsMatch(g.groupId, groupId));
  }

  // ==========================================================================
  // DRIVER SETTINGS
  // ==========================================================================

  /**
   * Settings for a driver, created with defaults on first access
   */
  async getDriverSettings(driverId: string): Promise<DriverSettingsRecord> {
    const existing = this.data.driverSettings.find(s => s.driverId === driverId);
    if (existing) return existing;

    const record: DriverSettingsRecord = stamp<DriverSettingsRecord>({
      driverId,
      quietHoursEnabled: false,
      quietHoursStart: DRIVER_DEFAULTS.QUIET_HOURS_START,
      quietHoursEnd: DRIVER_DEFAULTS.QUIET_HOURS_END
    });
    this.data.driverSettings.push(record);
    this.save();
    return record;
  }

  async updateDriverSettings(
    driverId: string,
    patch: Partial<Omit<NewRecord<DriverSettingsRecord>, 'driverId'>>
  ): Promise<DriverSettingsRecord> {
    const settings = await this.getDriverSettings(driverId);
    Object.assign(settings, patch, { updatedAt: new Date().toISOString() });
    this.save();
    return settings;
  }

  async clearBusy(driverId: string): Promise<void> {
    const settings = this.data.driverSettings.find(s => s.driverId === driverId);
    if (!settings || settings.busyUntil === undefined) return;
    delete settings.busyUntil;
    settings.updatedAt = new Date().toISOString();
    this.save();
  }

  // ==========================================================================
  // FAVORITES, BLACKLIST, QUICK REPLIES
  // ==========================================================================

  async addFavoriteRoute(driverId: string, pointA: string, pointB: string): Promise<FavoriteRouteRecord> {
    const record: FavoriteRouteRecord = stamp<FavoriteRouteRecord>({ driverId, pointA, pointB });
    this.data.favoriteRoutes.push(record);
    this.save();
    return record;
  }

  async listFavoriteRoutes(driverId: string): Promise<FavoriteRouteRecord[]> {
    return this.data.favoriteRoutes.filter(f => f.driverId === driverId);
  }

  async addToBlacklist(driverId: string, kind: BlacklistKind, value: string): Promise<BlacklistRecord> {
    const stored = kind === 'author' ? normalizeAuthor(value) : value.trim();
    const record: BlacklistRecord = stamp<BlacklistRecord>({ driverId, kind, value: stored });
    this.data.blacklist.push(record);
    this.save();
    return record;
  }

  async isBlacklisted(driverId: string, query: BlacklistQuery): Promise<boolean> {
    const authorKeys = [query.authorId, query.authorUsername]
      .filter((v): v is string => typeof v === 'string' && v.trim() !== '')
      .map(normalizeAuthor);

    return this.data.blacklist.some(entry => {
      if (entry.driverId !== driverId) return false;
      if (entry.kind === 'group') return chatIdsMatch(entry.value, query.groupId);
      return authorKeys.includes(entry.value);
    });
  }

  async addQuickReply(driverId: string, label: string, text: string): Promise<QuickReplyRecord> {
    const position = this.data.quickReplies.filter(q => q.driverId === driverId).length;
    const record: QuickReplyRecord = stamp<QuickReplyRecord>({ driverId, label, text, position });
    this.data.quickReplies.push(record);
    this.save();
    return record;
  }

  async listQuickReplies(driverId: string): Promise<QuickReplyRecord[]> {
    return this.data.quickReplies
      .filter(q => q.driverId === driverId)
      .sort((a, b) => a.position - b.position);
  }

  // ==========================================================================
  // RESPONSES & STATS
  // ==========================================================================

  async saveOrderResponse(input: NewRecord<OrderResponseRecord>): Promise<OrderResponseRecord> {
    const record: OrderResponseRecord = stamp<OrderResponseRecord>(input);
    this.data.orderResponses.push(record);
    this.save();
    return record;
  }

  async addDriverStat(input: NewRecord<DriverStatRecord>): Promise<DriverStatRecord> {
    const record: DriverStatRecord = stamp<DriverStatRecord>(input);
    this.data.driverStats.push(record);
    this.save();
    return record;
  }

  async listDriverStats(driverId: string): Promise<DriverStatRecord[]> {
    return this.data.driverStats.filter(s => s.driverId === driverId);
  }
}
