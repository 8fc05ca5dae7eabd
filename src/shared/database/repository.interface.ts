/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * The operations the pipeline needs from persistent storage.
 * DatabaseService (db.ts) is the JSON-file implementation; a relational
 * implementation only has to honour the same unique keys:
 *
 *   orders            sourceLink
 *   orderGroupLinks   (routeKey, driverId, sourceLink)
 *
 * BENEFITS:
 * - Swap storage without changing business logic
 * - Easy to fake in tests
 * =============================================================================
 */

import type {
  DriverRecord,
  DriverSettingsRecord,
  DriverStatRecord,
  FavoriteRouteRecord,
  GroupSubscriptionRecord,
  NewRecord,
  NotificationRecord,
  OrderGroupLinkRecord,
  OrderRecord,
  OrderResponseRecord,
  QuickReplyRecord
} from './db';

/**
 * Result of an insert guarded by a unique key
 */
export interface UpsertResult<T> {
  record: T;
  /** false when the key already existed and nothing was written */
  created: boolean;
}

export interface AuthorizedAccount {
  accountId: string;
  sessionString: string;
}

export interface BlacklistQuery {
  authorId?: string;
  authorUsername?: string;
  groupId: string;
}

/**
 * Driver roster as seen by the matcher
 */
export interface DriverRoster {
  listActiveDrivers(): Promise<DriverRecord[]>;
  listDriversSubscribedToGroup(groupId: string): Promise<DriverRecord[]>;
  listAdmins(): Promise<DriverRecord[]>;
  isSubscribedToGroup(driverId: string, groupId: string): Promise<boolean>;
}

/**
 * Monitoring accounts and their subscriptions as seen by the monitor fan-out
 */
export interface AccountDirectory {
  listAuthorizedAccounts(): Promise<AuthorizedAccount[]>;
  listActiveGroupSubscriptions(accountId: string): Promise<GroupSubscriptionRecord[]>;
  getMonitorSession(driverId: string): Promise<string | undefined>;
  setDriverAuthorized(driverId: string, isAuthorized: boolean): Promise<void>;
}

/**
 * Full store contract used by the notification coordinator and reply path
 */
export interface IDataStore extends DriverRoster, AccountDirectory {
  getDriverById(id: string): Promise<DriverRecord | undefined>;
  getDriverByTelegramId(telegramId: number): Promise<DriverRecord | undefined>;

  saveOrder(order: NewRecord<OrderRecord>): Promise<UpsertResult<OrderRecord>>;
  getOrderBySourceLink(sourceLink: string): Promise<OrderRecord | undefined>;

  saveNotification(input: NewRecord<NotificationRecord>): Promise<NotificationRecord>;
  findRecentNotification(driverId: string, routeKey: string, since: Date): Promise<NotificationRecord | undefined>;
  findNotificationByMessageId(driverId: string, messageId: number): Promise<NotificationRecord | undefined>;
  updateNotification(
    id: string,
    patch: Partial<Pick<NotificationRecord, 'groupId' | 'sourceMessageId' | 'sourceLink'>>
  ): Promise<void>;

  addGroupLink(input: NewRecord<OrderGroupLinkRecord>): Promise<UpsertResult<OrderGroupLinkRecord>>;
  listGroupLinks(driverId: string, routeKey: string, since?: string): Promise<OrderGroupLinkRecord[]>;

  isServiceGroup(groupId: string): Promise<boolean>;

  getDriverSettings(driverId: string): Promise<DriverSettingsRecord>;
  clearBusy(driverId: string): Promise<void>;

  listFavoriteRoutes(driverId: string): Promise<FavoriteRouteRecord[]>;
  isBlacklisted(driverId: string, query: BlacklistQuery): Promise<boolean>;
  listQuickReplies(driverId: string): Promise<QuickReplyRecord[]>;

  saveOrderResponse(input: NewRecord<OrderResponseRecord>): Promise<OrderResponseRecord>;
  addDriverStat(input: NewRecord<DriverStatRecord>): Promise<DriverStatRecord>;
}
