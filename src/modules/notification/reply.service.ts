/**
 * =============================================================================
 * NOTIFICATION MODULE - REPLY SERVICE
 * =============================================================================
 *
 * Quick replies: a driver taps a button under a notification and a canned
 * text is posted as a threaded reply in the source group, using the driver's
 * own monitoring session.
 *
 * The posting the notification currently shows is tried first. A permission
 * error there (banned, read-only group) moves on to the other postings folded
 * into the same notification; any other error ends the attempt.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import type { IDataStore } from '../../shared/database/repository.interface';
import type { NotificationRecord, OrderGroupLinkRecord } from '../../shared/database/db';
import type { GroupReplySender } from './notification.types';

interface ReplyTarget {
  groupId: string;
  messageId: number;
  sourceLink: string;
}

export type ReplyOutcome =
  | { success: true; groupId: string; sourceLink: string }
  | { success: false; errorDetail: string };

type ReplyStore = Pick<
  IDataStore,
  | 'findNotificationByMessageId'
  | 'getMonitorSession'
  | 'listGroupLinks'
  | 'getOrderBySourceLink'
  | 'saveOrderResponse'
  | 'addDriverStat'
>;

/**
 * Primary posting first, then the notification's other postings oldest first
 */
export function replyTargets(notification: NotificationRecord, links: OrderGroupLinkRecord[]): ReplyTarget[] {
  const primary: ReplyTarget = {
    groupId: notification.groupId,
    messageId: notification.sourceMessageId,
    sourceLink: notification.sourceLink
  };
  const others = links
    .filter(l => l.sourceLink !== primary.sourceLink)
    .map(l => ({ groupId: l.groupId, messageId: l.messageId, sourceLink: l.sourceLink }));
  return [primary, ...others];
}

export class ReplyService {
  constructor(
    private readonly store: ReplyStore,
    private readonly sender: GroupReplySender
  ) {}

  /**
   * @param notificationMessageId - handle of the bot message the driver tapped under
   */
  async replyToOrder(driverId: string, notificationMessageId: number, text: string): Promise<ReplyOutcome> {
    const notification = await this.store.findNotificationByMessageId(driverId, notificationMessageId);
    if (!notification) {
      return { success: false, errorDetail: 'Заказ не найден' };
    }

    const sessionString = await this.store.getMonitorSession(driverId);
    if (!sessionString) {
      return { success: false, errorDetail: 'Аккаунт не авторизован' };
    }

    if (!notification.sourceLink) {
      return { success: false, errorDetail: 'Нет исходного сообщения для ответа' };
    }
    const links = await this.store.listGroupLinks(driverId, notification.routeKey, notification.linksSince);

    let lastError = '';
    for (const link of replyTargets(notification, links)) {
      const result = await this.sender.sendGroupReply(
        { accountId: driverId, sessionString },
        link.groupId,
        link.messageId,
        text
      );

      if (result.success) {
        const order = await this.store.getOrderBySourceLink(link.sourceLink);
        await this.store.saveOrderResponse({
          driverId,
          routeKey: notification.routeKey,
          sourceLink: link.sourceLink,
          groupId: link.groupId,
          replyText: text
        });
        await this.store.addDriverStat({
          driverId,
          routeKey: notification.routeKey,
          price: order?.price,
          status: 'pending'
        });
        logger.info('[Reply] Posted quick reply', { driverId, groupId: link.groupId });
        return { success: true, groupId: link.groupId, sourceLink: link.sourceLink };
      }

      lastError = result.errorDetail;
      if (!result.permissionDenied) {
        break;
      }
      logger.warn('[Reply] No permission in group, trying the next posting', {
        driverId,
        groupId: link.groupId,
        error: result.errorDetail
      });
    }

    logger.warn('[Reply] Could not post quick reply', { driverId, routeKey: notification.routeKey, error: lastError });
    return { success: false, errorDetail: lastError };
  }
}
