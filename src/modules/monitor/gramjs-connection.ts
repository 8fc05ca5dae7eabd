/**
 * =============================================================================
 * MONITOR MODULE - GRAMJS CONNECTION
 * =============================================================================
 *
 * MonitorConnection over a user-account MTProto session (`telegram` package).
 * Chat ids leave this file in their marked form.
 * =============================================================================
 */

import bigInt from 'big-integer';
import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { NewMessage, NewMessageEvent } from 'telegram/events';
import { RPCError } from 'telegram/errors';
import { LogLevel } from 'telegram/extensions/Logger';
import { config } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import { markedChatId } from '../../shared/utils/chat-id.utils';
import { ExternalServiceError, ReplyForbiddenError, errorMessage } from '../../core/errors/AppError';
import { ErrorCode, MONITOR } from '../../core/constants';
import type {
  IncomingMessage,
  MessageHandler,
  MonitorConnection,
  MonitorConnectionFactory,
  SenderInfo,
  VisibleChat
} from './monitor.types';

/** RPC errors meaning "this account may not post here" */
const PERMISSION_ERRORS = new Set([
  'CHAT_WRITE_FORBIDDEN',
  'CHAT_ADMIN_REQUIRED',
  'CHAT_RESTRICTED',
  'CHAT_SEND_PLAIN_FORBIDDEN',
  'CHAT_GUEST_SEND_FORBIDDEN',
  'CHANNEL_PRIVATE',
  'USER_BANNED_IN_CHANNEL'
]);

export function isPermissionError(error: unknown): boolean {
  return error instanceof RPCError && PERMISSION_ERRORS.has(error.errorMessage);
}

function toVisibleChat(entity: unknown): VisibleChat | null {
  if (entity instanceof Api.Channel) {
    return {
      id: markedChatId(entity.id.toString(), 'channel'),
      title: entity.title,
      username: entity.username ?? undefined,
      kind: 'channel'
    };
  }
  if (entity instanceof Api.Chat) {
    return { id: markedChatId(entity.id.toString(), 'group'), title: entity.title, kind: 'group' };
  }
  return null;
}

async function senderOf(message: Api.Message): Promise<SenderInfo> {
  const postAuthor = message.postAuthor ?? undefined;
  try {
    const sender = await message.getSender();
    if (sender instanceof Api.User) {
      return {
        kind: 'user',
        id: sender.id.toString(),
        username: sender.username ?? undefined,
        firstName: sender.firstName ?? undefined
      };
    }
    if (sender instanceof Api.Channel || sender instanceof Api.Chat) {
      return { kind: 'chat', id: sender.id.toString(), postAuthor };
    }
  } catch (error) {
    logger.debug('[Monitor] Could not resolve sender', { error: errorMessage(error) });
  }
  return { kind: 'unknown', postAuthor };
}

export class GramjsConnection implements MonitorConnection {
  private readonly client: TelegramClient;

  constructor(sessionString: string, apiId: number, apiHash: string) {
    this.client = new TelegramClient(new StringSession(sessionString), apiId, apiHash, {
      connectionRetries: MONITOR.CONNECTION_RETRIES
    });
    this.client.setLogLevel(LogLevel.ERROR);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  isAuthorized(): Promise<boolean> {
    return this.client.checkAuthorization();
  }

  async listChats(): Promise<VisibleChat[]> {
    const dialogs = await this.client.getDialogs({});
    const chats: VisibleChat[] = [];
    for (const dialog of dialogs) {
      const chat = toVisibleChat(dialog.entity);
      if (chat) chats.push(chat);
    }
    return chats;
  }

  onMessage(handler: MessageHandler): void {
    this.client.addEventHandler(async (event: NewMessageEvent) => {
      const message = event.message;
      const chatId = message.chatId;
      if (!chatId || !message.message) return;

      const incoming: IncomingMessage = {
        chatId: chatId.toString(),
        messageId: message.id,
        text: message.message,
        sender: await senderOf(message)
      };

      try {
        await handler(incoming);
      } catch (error) {
        logger.error('[Monitor] Message handler failed', { chatId: incoming.chatId, error: errorMessage(error) });
      }
    }, new NewMessage({}));
  }

  async sendReply(chatId: string, replyToMessageId: number, text: string): Promise<void> {
    try {
      await this.client.sendMessage(bigInt(chatId), { message: text, replyTo: replyToMessageId });
    } catch (error) {
      if (isPermissionError(error)) {
        throw new ReplyForbiddenError(chatId, errorMessage(error));
      }
      throw new ExternalServiceError('telegram', `Reply failed: ${errorMessage(error)}`, false, ErrorCode.DELIVERY_REPLY_FAILED);
    }
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }
}

export const createGramjsConnection: MonitorConnectionFactory = sessionString =>
  new GramjsConnection(sessionString, config.telegram.apiId, config.telegram.apiHash);
