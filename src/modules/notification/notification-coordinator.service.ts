/**
 * =============================================================================
 * NOTIFICATION MODULE - COORDINATOR
 * =============================================================================
 *
 * Per matched driver, for one order:
 *
 *   1. suppression: quiet hours, busy mode, blacklist (author or group)
 *   2. route key + lookup of a notification sent within the freshness window
 *   3. group link recorded (idempotent on source link), body re-rendered
 *      with every posting of the route seen so far
 *   4. edit the existing message; on failure, or when none exists, send a
 *      new one and record its handle
 *
 * Per (driver, route): NONE → SENT → SENT (edited) … → EXPIRED → SENT.
 *
 * Two near-simultaneous postings of one route may both miss the lookup and
 * produce two messages. That is accepted; the store's unique keys keep the
 * bookkeeping consistent.
 *
 * A failure notifying one driver is logged and never stops the others.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import type { IDataStore } from '../../shared/database/repository.interface';
import type { OrderGroupLinkRecord } from '../../shared/database/db';
import { errorMessage } from '../../core/errors/AppError';
import { NOTIFICATION_FRESHNESS_HOURS } from '../../core/constants';
import type { DriverMatch, DriverMatcher } from '../matching/driver-matcher.service';
import { normalizeRouteKey } from '../order-extractor/order-extractor.service';
import type { MessageAuthor, ParsedOrder } from '../order-extractor/order.types';
import { GroupPosting, renderNotification } from './notification.formatter';
import { isInQuietHours } from './quiet-hours';
import type {
  NotificationChannel,
  NotifyOutcome,
  ProcessOrderSummary,
  SuppressionReason
} from './notification.types';

const HOUR_MS = 60 * 60 * 1000;

export interface NotificationCoordinatorOptions {
  timezone: string;
  windowHours?: number;
  now?: () => Date;
}

/**
 * Most recently recorded non-empty author among the route's postings
 */
export function latestAuthor(links: OrderGroupLinkRecord[]): MessageAuthor | null {
  for (let i = links.length - 1; i >= 0; i--) {
    const link = links[i];
    if (link.authorId || link.authorUsername || link.authorFirstName) {
      return { id: link.authorId, username: link.authorUsername, firstName: link.authorFirstName };
    }
  }
  return null;
}

export class NotificationCoordinator {
  private readonly windowMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: IDataStore,
    private readonly matcher: DriverMatcher,
    private readonly channel: NotificationChannel,
    private readonly options: NotificationCoordinatorOptions
  ) {
    this.windowMs = (options.windowHours ?? NOTIFICATION_FRESHNESS_HOURS) * HOUR_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Match an order and notify every eligible driver
   */
  async processOrder(order: ParsedOrder): Promise<ProcessOrderSummary> {
    const summary: ProcessOrderSummary = { matched: 0, sent: 0, edited: 0, suppressed: 0, failed: 0 };

    if (!order.pointACoords) {
      logger.debug('[Notify] Order has no origin coordinates, skipping', { sourceLink: order.sourceLink });
      return summary;
    }

    const { created } = await this.store.saveOrder({
      sourceLink: order.sourceLink,
      pointA: order.pointA,
      pointB: order.pointB,
      price: order.price ?? undefined,
      region: order.region ?? undefined,
      sourceGroupId: order.sourceGroupId,
      sourceGroupTitle: order.sourceGroupTitle,
      messageId: order.messageId,
      authorId: order.author.id,
      authorUsername: order.author.username,
      text: order.text
    });
    if (!created) {
      logger.debug('[Notify] Order already stored', { sourceLink: order.sourceLink });
    }

    const matches = await this.matcher.findEligibleDrivers(order);
    const matchedIds = new Set(matches.map(m => m.driver.id));
    const extras = await this.matcher.findAdminExtras(order, matchedIds);
    const targets = [...matches, ...extras];
    summary.matched = targets.length;

    for (const match of targets) {
      let outcome: NotifyOutcome;
      try {
        outcome = await this.notifyDriver(match, order);
      } catch (error) {
        logger.error('[Notify] Failed to notify driver', {
          driverId: match.driver.id,
          sourceLink: order.sourceLink,
          error: errorMessage(error)
        });
        outcome = 'failed';
      }
      summary[outcome]++;
    }

    logger.info(`[Notify] ${order.pointA} → ${order.pointB}`, { sourceLink: order.sourceLink, ...summary });
    return summary;
  }

  /**
   * Send or edit one driver's notification for the order's route
   */
  async notifyDriver(match: DriverMatch, order: ParsedOrder): Promise<NotifyOutcome> {
    const driverId = match.driver.id;
    const now = this.now();

    const reason = await this.suppressionReason(driverId, order, now);
    if (reason) {
      logger.debug('[Notify] Suppressed', { driverId, reason });
      return 'suppressed';
    }

    const routeKey = normalizeRouteKey(order.pointA, order.pointB);
    const existing = await this.store.findRecentNotification(driverId, routeKey, new Date(now.getTime() - this.windowMs));
    // Postings from an expired notification's lifetime stay out of the new one
    const linksSince = existing ? existing.linksSince : now.toISOString();
    const posting = { groupId: order.sourceGroupId, sourceMessageId: order.messageId, sourceLink: order.sourceLink };

    await this.store.addGroupLink({
      driverId,
      routeKey,
      sourceLink: order.sourceLink,
      groupId: order.sourceGroupId,
      groupTitle: order.sourceGroupTitle,
      messageId: order.messageId,
      authorId: order.author.id,
      authorUsername: order.author.username,
      authorFirstName: order.author.firstName,
      seenAt: now.toISOString()
    });

    const body = await this.renderBody(match, order, routeKey, linksSince);

    if (existing && existing.messageId > 0) {
      const edited = await this.tryEdit(driverId, existing.messageId, body, order);
      if (edited) {
        await this.store.updateNotification(existing.id, posting);
        return 'edited';
      }
      logger.warn('[Notify] Edit failed, sending a new message', { driverId, messageId: existing.messageId });
    }

    const messageHandle = await this.channel.sendNotification(
      driverId,
      body,
      order.sourceLink,
      order.sourceGroupId,
      order.messageId
    );
    await this.store.saveNotification({
      driverId,
      routeKey,
      messageId: messageHandle,
      sentAt: now.toISOString(),
      linksSince,
      ...posting
    });
    return 'sent';
  }

  private async tryEdit(driverId: string, messageHandle: number, body: string, order: ParsedOrder): Promise<boolean> {
    try {
      return await this.channel.editNotification(
        driverId,
        messageHandle,
        body,
        order.sourceLink,
        order.sourceGroupId,
        order.messageId
      );
    } catch (error) {
      logger.warn('[Notify] Edit threw', { driverId, messageHandle, error: errorMessage(error) });
      return false;
    }
  }

  async suppressionReason(driverId: string, order: ParsedOrder, now: Date): Promise<SuppressionReason | null> {
    const settings = await this.store.getDriverSettings(driverId);

    if (isInQuietHours(settings, now, this.options.timezone)) {
      return 'quiet-hours';
    }

    if (settings.busyUntil) {
      if (Date.parse(settings.busyUntil) > now.getTime()) {
        return 'busy';
      }
      await this.store.clearBusy(driverId);
    }

    const blacklisted = await this.store.isBlacklisted(driverId, {
      authorId: order.author.id,
      authorUsername: order.author.username,
      groupId: order.sourceGroupId
    });
    return blacklisted ? 'blacklisted' : null;
  }

  private async renderBody(match: DriverMatch, order: ParsedOrder, routeKey: string, linksSince: string): Promise<string> {
    const driverId = match.driver.id;
    const [links, favorites] = await Promise.all([
      this.store.listGroupLinks(driverId, routeKey, linksSince),
      this.store.listFavoriteRoutes(driverId)
    ]);

    const groups: GroupPosting[] = [];
    for (const link of links) {
      groups.push({
        title: link.groupTitle,
        link: link.sourceLink,
        isService: await this.store.isServiceGroup(link.groupId)
      });
    }

    return renderNotification({
      pointA: order.pointA,
      pointB: order.pointB,
      text: order.text,
      favorite: favorites.some(f => normalizeRouteKey(f.pointA, f.pointB) === routeKey),
      adminExtra: match.adminExtra,
      author: latestAuthor(links),
      groups
    });
  }
}
