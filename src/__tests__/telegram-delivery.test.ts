/**
 * =============================================================================
 * TELEGRAM DELIVERY - Tests
 * =============================================================================
 *
 * Covers the parts of the bot channel that never reach the Bot API.
 * =============================================================================
 */

import { Telegraf, TelegramError } from 'telegraf';
import {
  TelegramDeliveryChannel,
  isNotModifiedError,
  quickReplyKeyboard,
  respondedKeyboard
} from '../modules/notification/telegram-delivery';
import { ReplyService } from '../modules/notification/reply.service';
import { DatabaseService, DriverRecord } from '../shared/database/db';
import type { GroupReplyResult, GroupReplySender } from '../modules/notification/notification.types';
import { DeliveryError } from '../core/errors/AppError';
import { ErrorCode } from '../core/constants';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const offline: GroupReplySender = {
  sendGroupReply: async () => ({ success: false, errorDetail: 'offline', permissionDenied: false })
};

function channel(store: DatabaseService, sender: GroupReplySender = offline): TelegramDeliveryChannel {
  return new TelegramDeliveryChannel(new Telegraf('123456:test-token'), store, new ReplyService(store, sender));
}

const LINK = 'https://t.me/c/1700000001/7';

async function notifiedDriver(store: DatabaseService): Promise<DriverRecord> {
  const driver = await store.upsertDriver({ telegramId: 1001 });
  await store.saveMonitorSession(driver.id, 'session-placeholder');
  await store.saveNotification({
    driverId: driver.id,
    routeKey: 'уфа:казань',
    messageId: 101,
    sentAt: '2026-03-10T12:00:00.000Z',
    linksSince: '2026-03-10T12:00:00.000Z',
    groupId: '-1001700000001',
    sourceMessageId: 7,
    sourceLink: LINK
  });
  return driver;
}

class SentTexts implements GroupReplySender {
  texts: string[] = [];

  async sendGroupReply(_credential: unknown, _groupId: string, _messageId: number, text: string): Promise<GroupReplyResult> {
    this.texts.push(text);
    return { success: true };
  }
}

describe('TelegramDeliveryChannel', () => {
  let store: DatabaseService;

  beforeEach(() => {
    store = new DatabaseService(null);
  });

  it('should offer the default quick replies', async () => {
    const driver = await store.upsertDriver({ telegramId: 1001 });

    await expect(channel(store).quickRepliesFor(driver.id)).resolves.toEqual([
      { id: 'default-take', label: 'Взять себе', text: 'я' },
      { id: 'default-other', label: 'Не себе', text: 'не себе' }
    ]);
  });

  it('should prefer the driver\'s own quick replies', async () => {
    const driver = await store.upsertDriver({ telegramId: 1001 });
    const own = await store.addQuickReply(driver.id, 'Еду', 'Беру, буду через 10 минут');

    await expect(channel(store).quickRepliesFor(driver.id)).resolves.toEqual([
      { id: own.id, label: 'Еду', text: 'Беру, буду через 10 минут' }
    ]);
  });

  it('should put the reply id in the button data', () => {
    const keyboard = quickReplyKeyboard([{ id: 'default-take', label: 'Взять себе', text: 'я' }], LINK);

    expect(keyboard.reply_markup.inline_keyboard).toMatchObject([
      [{ text: 'Взять себе', callback_data: 'qr:default-take' }],
      [{ text: 'Открыть пост', url: LINK }]
    ]);
  });

  it('should replace the buttons with a responded marker', () => {
    expect(respondedKeyboard(LINK).reply_markup.inline_keyboard).toMatchObject([
      [{ text: '✅ Вы откликнулись на заказ!', url: LINK }]
    ]);
  });

  it('should fail delivery to an unknown driver', async () => {
    const sending = channel(store).sendNotification('missing', 'body', 'https://t.me/c/1/1', '-1001', 1);

    await expect(sending).rejects.toBeInstanceOf(DeliveryError);
    await expect(sending).rejects.toMatchObject({ code: ErrorCode.DRIVER_NOT_FOUND });
  });

  describe('handleQuickReply', () => {
    it('should send the text of the tapped reply even after the list changed', async () => {
      const driver = await notifiedDriver(store);
      const sender = new SentTexts();
      const bot = channel(store, sender);
      // The notification was sent with the default buttons; the driver then added their own
      await store.addQuickReply(driver.id, 'Еду', 'Беру, буду через 10 минут');

      const answer = await bot.handleQuickReply(1001, 101, 'default-take');

      expect(sender.texts).toEqual(['я']);
      expect(answer).toEqual({ text: 'Ответ отправлен ✅', alert: false, respondedLink: LINK });
    });

    it('should send a custom reply by its id', async () => {
      const driver = await notifiedDriver(store);
      const own = await store.addQuickReply(driver.id, 'Еду', 'Беру, буду через 10 минут');
      const sender = new SentTexts();

      await channel(store, sender).handleQuickReply(1001, 101, own.id);

      expect(sender.texts).toEqual(['Беру, буду через 10 минут']);
    });

    it('should reject a button whose reply no longer exists', async () => {
      await notifiedDriver(store);
      const sender = new SentTexts();

      await expect(channel(store, sender).handleQuickReply(1001, 101, 'deleted-reply'))
        .resolves.toEqual({ text: 'Кнопка устарела.', alert: false });
      expect(sender.texts).toEqual([]);
    });

    it('should alert on a failed reply without a responded marker', async () => {
      await notifiedDriver(store);

      await expect(channel(store).handleQuickReply(1001, 101, 'default-take'))
        .resolves.toEqual({ text: 'Не удалось отправить: offline', alert: true });
    });

    it('should ask an unknown user to register', async () => {
      await expect(channel(store).handleQuickReply(4242, 101, 'default-take'))
        .resolves.toEqual({ text: 'Сначала зарегистрируйтесь.', alert: true });
    });
  });

  it('should report an edit for an unknown driver as not applied', async () => {
    await expect(channel(store).editNotification('missing', 101, 'body', 'https://t.me/c/1/1', '-1001', 1)).resolves.toBe(false);
  });
});

describe('isNotModifiedError', () => {
  it('should recognise an unchanged edit', () => {
    const error = new TelegramError({
      error_code: 400,
      description: 'Bad Request: message is not modified: specified new message content is the same'
    });
    expect(isNotModifiedError(error)).toBe(true);
  });

  it('should not match other errors', () => {
    expect(isNotModifiedError(new TelegramError({ error_code: 403, description: 'Forbidden: bot was blocked by the user' }))).toBe(false);
    expect(isNotModifiedError(new Error('message is not modified'))).toBe(false);
  });
});
