/**
 * =============================================================================
 * NOTIFICATION MODULE - TELEGRAM DELIVERY
 * =============================================================================
 *
 * The notification bot: sends and edits driver notifications with an inline
 * keyboard of quick replies and a link to the original post, and handles the
 * quick-reply taps.
 *
 * Buttons carry the reply's id, not its position, so editing the reply list
 * never changes what an older button sends. A second tap while the first
 * reply is still in flight is refused through the pending-action store.
 * After a successful reply the buttons give way to a single "responded"
 * link to the posting that was answered.
 * =============================================================================
 */

import { Markup, Telegraf, TelegramError } from 'telegraf';
import { logger } from '../../shared/services/logger.service';
import { SessionStore } from '../../shared/services/session-store.service';
import type { IDataStore } from '../../shared/database/repository.interface';
import { DeliveryError, errorMessage } from '../../core/errors/AppError';
import { DEFAULT_QUICK_REPLIES, ErrorCode, PENDING_ACTION_TTL_MS } from '../../core/constants';
import type { NotificationChannel } from './notification.types';
import type { ReplyService } from './reply.service';

const QUICK_REPLY_ACTION = /^qr:([\w-]+)$/;

export interface QuickReply {
  id: string;
  label: string;
  text: string;
}

export interface QuickReplyAnswer {
  text: string;
  alert: boolean;
  /** Set when the reply was posted */
  respondedLink?: string;
}

interface PendingReply {
  messageId: number;
  startedAt: number;
}

type DeliveryStore = Pick<IDataStore, 'getDriverById' | 'getDriverByTelegramId' | 'listQuickReplies'>;

export function isNotModifiedError(error: unknown): boolean {
  return error instanceof TelegramError && error.description.includes('message is not modified');
}

export function quickReplyKeyboard(replies: QuickReply[], link: string) {
  return Markup.inlineKeyboard([
    replies.map(reply => Markup.button.callback(reply.label, `qr:${reply.id}`)),
    [Markup.button.url('Открыть пост', link)]
  ]);
}

export function respondedKeyboard(link: string) {
  return Markup.inlineKeyboard([[Markup.button.url('✅ Вы откликнулись на заказ!', link)]]);
}

export class TelegramDeliveryChannel implements NotificationChannel {
  constructor(
    private readonly bot: Telegraf,
    private readonly store: DeliveryStore,
    private readonly replies: ReplyService,
    private readonly pending: SessionStore<PendingReply> = new SessionStore<PendingReply>('quick-reply', PENDING_ACTION_TTL_MS)
  ) {}

  async sendNotification(driverId: string, body: string, link: string, groupId: string, messageId: number): Promise<number> {
    const driver = await this.store.getDriverById(driverId);
    if (!driver) {
      throw new DeliveryError(`Driver ${driverId} not found`, ErrorCode.DRIVER_NOT_FOUND);
    }

    try {
      const sent = await this.bot.telegram.sendMessage(driver.telegramId, body, {
        parse_mode: 'HTML',
        reply_markup: (await this.keyboard(driverId, link)).reply_markup
      });
      return sent.message_id;
    } catch (error) {
      throw new DeliveryError(`Send to driver ${driverId} failed: ${errorMessage(error)}`, ErrorCode.DELIVERY_SEND_FAILED, {
        groupId,
        sourceMessageId: messageId
      });
    }
  }

  async editNotification(
    driverId: string,
    messageHandle: number,
    body: string,
    link: string,
    groupId: string,
    sourceMessageId: number
  ): Promise<boolean> {
    const driver = await this.store.getDriverById(driverId);
    if (!driver) return false;

    try {
      await this.bot.telegram.editMessageText(driver.telegramId, messageHandle, undefined, body, {
        parse_mode: 'HTML',
        reply_markup: (await this.keyboard(driverId, link)).reply_markup
      });
      return true;
    } catch (error) {
      if (isNotModifiedError(error)) return true;
      logger.warn('[Bot] Edit failed', {
        driverId,
        messageHandle,
        groupId,
        sourceMessageId,
        error: errorMessage(error)
      });
      return false;
    }
  }

  async quickRepliesFor(driverId: string): Promise<QuickReply[]> {
    const custom = await this.store.listQuickReplies(driverId);
    if (custom.length > 0) {
      return custom.map(r => ({ id: r.id, label: r.label, text: r.text }));
    }
    return DEFAULT_QUICK_REPLIES.map(r => ({ id: r.id, label: r.label, text: r.text }));
  }

  /**
   * A reply by id among the driver's own and the default ones, so a button
   * from before the list changed still sends its original text
   */
  async findQuickReply(driverId: string, replyId: string): Promise<QuickReply | undefined> {
    const custom = await this.store.listQuickReplies(driverId);
    const own = custom.find(r => r.id === replyId);
    if (own) return { id: own.id, label: own.label, text: own.text };
    return DEFAULT_QUICK_REPLIES.find(r => r.id === replyId);
  }

  private async keyboard(driverId: string, link: string) {
    return quickReplyKeyboard(await this.quickRepliesFor(driverId), link);
  }

  // ===========================================================================
  // QUICK REPLY HANDLER
  // ===========================================================================

  /**
   * @param messageHandle - the notification the button was under
   */
  async handleQuickReply(telegramId: number, messageHandle: number, replyId: string): Promise<QuickReplyAnswer> {
    const driver = await this.store.getDriverByTelegramId(telegramId);
    if (!driver) {
      return { text: 'Сначала зарегистрируйтесь.', alert: true };
    }

    const choice = await this.findQuickReply(driver.id, replyId);
    if (!choice) {
      return { text: 'Кнопка устарела.', alert: false };
    }

    if (!this.pending.begin(driver.id, { messageId: messageHandle, startedAt: Date.now() })) {
      return { text: 'Ответ уже отправляется…', alert: false };
    }

    try {
      const outcome = await this.replies.replyToOrder(driver.id, messageHandle, choice.text);
      if (outcome.success) {
        return { text: 'Ответ отправлен ✅', alert: false, respondedLink: outcome.sourceLink };
      }
      return { text: `Не удалось отправить: ${outcome.errorDetail}`, alert: true };
    } catch (error) {
      logger.error('[Bot] Quick reply failed', { driverId: driver.id, error: errorMessage(error) });
      return { text: 'Не удалось отправить ответ. Попробуйте позже.', alert: true };
    } finally {
      this.pending.end(driver.id);
    }
  }

  registerHandlers(): void {
    this.bot.action(QUICK_REPLY_ACTION, async ctx => {
      const telegramId = ctx.from?.id;
      const messageHandle = ctx.callbackQuery.message?.message_id;
      if (telegramId === undefined || messageHandle === undefined) {
        await ctx.answerCbQuery('Не удалось обработать действие.');
        return;
      }

      const answer = await this.handleQuickReply(telegramId, messageHandle, ctx.match[1]);
      await ctx.answerCbQuery(answer.text, answer.alert ? { show_alert: true } : undefined);

      if (answer.respondedLink) {
        try {
          await ctx.editMessageReplyMarkup(respondedKeyboard(answer.respondedLink).reply_markup);
        } catch (error) {
          if (!isNotModifiedError(error)) {
            logger.warn('[Bot] Could not mark notification as responded', { messageHandle, error: errorMessage(error) });
          }
        }
      }
    });

    this.bot.catch((error, ctx) => {
      logger.error('[Bot] Unhandled update error', { updateId: ctx.update.update_id, error: errorMessage(error) });
    });
  }

  launch(): void {
    this.registerHandlers();
    this.bot.launch().catch(error => {
      logger.error('[Bot] Polling stopped', { error: errorMessage(error) });
    });
    logger.info('[Bot] Notification bot started');
  }

  stop(reason: string): void {
    try {
      this.bot.stop(reason);
    } catch (error) {
      // Throws when polling never started
      logger.warn('[Bot] Stop skipped', { error: errorMessage(error) });
    }
  }
}

export function createNotificationBot(token: string): Telegraf {
  return new Telegraf(token);
}
