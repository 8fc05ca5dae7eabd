/**
 * =============================================================================
 * QUICK REPLY SERVICE - Tests
 * =============================================================================
 */

import { ReplyService } from '../modules/notification/reply.service';
import { DatabaseService, DriverRecord, NewRecord, NotificationRecord } from '../shared/database/db';
import type {
  AccountCredential,
  GroupReplyResult,
  GroupReplySender
} from '../modules/notification/notification.types';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const ROUTE = 'уфа:казань';
const LINK_1 = 'https://t.me/c/1700000001/7';
const LINK_2 = 'https://t.me/c/1700000002/9';
const SENT_AT = '2026-03-10T12:00:00.000Z';

function notification(driverId: string, messageId: number = 101): NewRecord<NotificationRecord> {
  return {
    driverId,
    routeKey: ROUTE,
    messageId,
    sentAt: SENT_AT,
    linksSince: SENT_AT,
    groupId: '-1001700000001',
    sourceMessageId: 7,
    sourceLink: LINK_1
  };
}

class ScriptedSender implements GroupReplySender {
  calls: Array<{ credential: AccountCredential; groupId: string; messageId: number; text: string }> = [];

  constructor(private readonly results: GroupReplyResult[]) {}

  async sendGroupReply(credential: AccountCredential, groupId: string, messageId: number, text: string): Promise<GroupReplyResult> {
    this.calls.push({ credential, groupId, messageId, text });
    return this.results.shift() ?? { success: false, errorDetail: 'unscripted', permissionDenied: false };
  }
}

async function seed(store: DatabaseService): Promise<DriverRecord> {
  const driver = await store.upsertDriver({ telegramId: 1001 });
  await store.saveMonitorSession(driver.id, 'session-placeholder');
  await store.saveNotification(notification(driver.id));
  await store.addGroupLink({
    driverId: driver.id, routeKey: ROUTE, sourceLink: LINK_1, groupId: '-1001700000001', groupTitle: 'Межгород', messageId: 7,
    seenAt: SENT_AT
  });
  await store.addGroupLink({
    driverId: driver.id, routeKey: ROUTE, sourceLink: LINK_2, groupId: '-1001700000002', groupTitle: 'Попутчики', messageId: 9,
    seenAt: '2026-03-10T12:30:00.000Z'
  });
  await store.saveOrder({
    sourceLink: LINK_2,
    pointA: 'Уфа',
    pointB: 'Казань',
    price: 3000,
    sourceGroupId: '-1001700000002',
    sourceGroupTitle: 'Попутчики',
    messageId: 9,
    text: 'Уфа - Казань 3000'
  });
  return driver;
}

describe('ReplyService', () => {
  let store: DatabaseService;

  beforeEach(() => {
    store = new DatabaseService(null);
  });

  it('should reply in the original group first', async () => {
    const driver = await seed(store);
    const sender = new ScriptedSender([{ success: true }]);
    const service = new ReplyService(store, sender);

    const outcome = await service.replyToOrder(driver.id, 101, 'я');

    expect(outcome).toEqual({ success: true, groupId: '-1001700000001', sourceLink: LINK_1 });
    expect(sender.calls).toEqual([{
      credential: { accountId: driver.id, sessionString: 'session-placeholder' },
      groupId: '-1001700000001',
      messageId: 7,
      text: 'я'
    }]);
  });

  it('should move on to the next posting after a permission error and record the response', async () => {
    const driver = await seed(store);
    const sender = new ScriptedSender([
      { success: false, errorDetail: 'CHAT_WRITE_FORBIDDEN', permissionDenied: true },
      { success: true }
    ]);
    const service = new ReplyService(store, sender);

    const outcome = await service.replyToOrder(driver.id, 101, 'не себе');

    expect(outcome).toEqual({ success: true, groupId: '-1001700000002', sourceLink: LINK_2 });
    expect(sender.calls.map(c => c.messageId)).toEqual([7, 9]);

    const stats = await store.listDriverStats(driver.id);
    expect(stats).toHaveLength(1);
    expect(stats[0]).toMatchObject({ routeKey: ROUTE, price: 3000, status: 'pending' });
  });

  it('should stop on any other error', async () => {
    const driver = await seed(store);
    const sender = new ScriptedSender([{ success: false, errorDetail: 'FLOOD_WAIT', permissionDenied: false }]);
    const service = new ReplyService(store, sender);

    await expect(service.replyToOrder(driver.id, 101, 'я')).resolves.toEqual({ success: false, errorDetail: 'FLOOD_WAIT' });
    expect(sender.calls).toHaveLength(1);
    await expect(store.listDriverStats(driver.id)).resolves.toEqual([]);
  });

  it('should report an unknown notification', async () => {
    const driver = await seed(store);
    const service = new ReplyService(store, new ScriptedSender([]));

    await expect(service.replyToOrder(driver.id, 999, 'я')).resolves.toEqual({ success: false, errorDetail: 'Заказ не найден' });
  });

  it('should report a driver without a monitoring session', async () => {
    const driver = await store.upsertDriver({ telegramId: 1001 });
    await store.saveNotification(notification(driver.id));
    const service = new ReplyService(store, new ScriptedSender([]));

    await expect(service.replyToOrder(driver.id, 101, 'я')).resolves.toEqual({ success: false, errorDetail: 'Аккаунт не авторизован' });
  });

  it('should report a notification without a source posting', async () => {
    const driver = await store.upsertDriver({ telegramId: 1001 });
    await store.saveMonitorSession(driver.id, 'session-placeholder');
    await store.saveNotification({ ...notification(driver.id), groupId: '', sourceMessageId: 0, sourceLink: '' });
    const service = new ReplyService(store, new ScriptedSender([]));

    await expect(service.replyToOrder(driver.id, 101, 'я'))
      .resolves.toEqual({ success: false, errorDetail: 'Нет исходного сообщения для ответа' });
  });

  it('should reply to the posting behind a later notification, not an expired one', async () => {
    const driver = await seed(store);
    const dayThree = '2026-03-12T09:00:00.000Z';
    const link3 = 'https://t.me/c/1700000002/55';
    await store.saveNotification({
      driverId: driver.id,
      routeKey: ROUTE,
      messageId: 102,
      sentAt: dayThree,
      linksSince: dayThree,
      groupId: '-1001700000002',
      sourceMessageId: 55,
      sourceLink: link3
    });
    await store.addGroupLink({
      driverId: driver.id, routeKey: ROUTE, sourceLink: link3, groupId: '-1001700000002', groupTitle: 'Попутчики', messageId: 55,
      seenAt: dayThree
    });
    const sender = new ScriptedSender([{ success: false, errorDetail: 'CHAT_WRITE_FORBIDDEN', permissionDenied: true }]);
    const service = new ReplyService(store, sender);

    const outcome = await service.replyToOrder(driver.id, 102, 'я');

    // Day-one postings belong to notification 101 and are not retried
    expect(outcome).toEqual({ success: false, errorDetail: 'CHAT_WRITE_FORBIDDEN' });
    expect(sender.calls.map(c => [c.groupId, c.messageId])).toEqual([['-1001700000002', 55]]);
  });

  it('should try the posting the notification currently shows before older ones', async () => {
    const driver = await seed(store);
    await store.updateNotification((await store.findNotificationByMessageId(driver.id, 101))?.id ?? '', {
      groupId: '-1001700000002',
      sourceMessageId: 9,
      sourceLink: LINK_2
    });
    const sender = new ScriptedSender([
      { success: false, errorDetail: 'CHAT_WRITE_FORBIDDEN', permissionDenied: true },
      { success: true }
    ]);
    const service = new ReplyService(store, sender);

    const outcome = await service.replyToOrder(driver.id, 101, 'я');

    expect(outcome).toEqual({ success: true, groupId: '-1001700000001', sourceLink: LINK_1 });
    expect(sender.calls.map(c => c.messageId)).toEqual([9, 7]);
  });
});
