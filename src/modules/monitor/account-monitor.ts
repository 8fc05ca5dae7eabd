/**
 * =============================================================================
 * MONITOR MODULE - ACCOUNT MONITOR
 * =============================================================================
 *
 * One authorized monitoring account:
 *
 *   start()    connect, check authorization, index visible chats, resolve
 *              the owner's subscriptions, listen for new messages
 *   refresh()  re-index and re-resolve without reconnecting; stops the
 *              monitor when authorization has expired
 *   stop()     disconnect
 *
 * Subscribed groups the account cannot see are logged as missing and
 * skipped. Every failure stays inside this monitor.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { ChatIdIndex, chatIdsMatch } from '../../shared/utils/chat-id.utils';
import type { AccountDirectory } from '../../shared/database/repository.interface';
import { errorMessage } from '../../core/errors/AppError';
import type { MessageAuthor, ParsedOrder } from '../order-extractor/order.types';
import type {
  IncomingMessage,
  MessageExtractor,
  MonitorConnection,
  MonitorConnectionFactory,
  SenderInfo,
  VisibleChat
} from './monitor.types';

export type MonitorState = 'idle' | 'running' | 'stopped';

export interface AccountMonitorOptions {
  accountId: string;
  sessionString: string;
  connectionFactory: MonitorConnectionFactory;
  directory: AccountDirectory;
  extractor: MessageExtractor;
  onOrder: (order: ParsedOrder, accountId: string) => Promise<void>;
  useAi: boolean;
}

/**
 * A human poster, unless the "sender" is the chat itself; then the post
 * signature, if any
 */
export function resolveAuthor(sender: SenderInfo, chatId: string): MessageAuthor {
  if (sender.kind === 'user' && sender.id && !chatIdsMatch(sender.id, chatId)) {
    return { id: sender.id, username: sender.username, firstName: sender.firstName };
  }
  return sender.postAuthor ? { firstName: sender.postAuthor } : {};
}

export class AccountMonitor {
  readonly accountId: string;
  private connection: MonitorConnection | null = null;
  private chats = new ChatIdIndex<VisibleChat>();
  private monitored = new Set<string>();
  private state: MonitorState = 'idle';

  constructor(private readonly options: AccountMonitorOptions) {
    this.accountId = options.accountId;
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  get monitoredGroups(): number {
    return this.monitored.size;
  }

  /**
   * @returns false when the session is not authorized or the connection failed
   */
  async start(): Promise<boolean> {
    try {
      const connection = this.options.connectionFactory(this.options.sessionString);
      this.connection = connection;
      await connection.connect();

      if (!(await this.refresh())) {
        return false;
      }

      connection.onMessage(message => this.handleMessage(message));
      this.state = 'running';
      logger.info(`[Monitor] Account ${this.accountId} started`, { groups: this.monitored.size });
      return true;
    } catch (error) {
      logger.error(`[Monitor] Account ${this.accountId} failed to start`, { error: errorMessage(error) });
      await this.stop();
      return false;
    }
  }

  /**
   * Re-resolve the monitored set on the live connection.
   * @returns false when the account is no longer authorized (monitor stopped)
   */
  async refresh(): Promise<boolean> {
    const connection = this.connection;
    if (!connection) return false;

    if (!(await connection.isAuthorized())) {
      logger.warn(`[Monitor] Account ${this.accountId} is no longer authorized`);
      await this.options.directory.setDriverAuthorized(this.accountId, false);
      await this.stop();
      return false;
    }

    const index = new ChatIdIndex<VisibleChat>();
    for (const chat of await connection.listChats()) {
      index.add(chat.id, chat);
    }
    this.chats = index;

    const subscriptions = await this.options.directory.listActiveGroupSubscriptions(this.accountId);
    const monitored = new Set<string>();
    const missing: string[] = [];
    for (const subscription of subscriptions) {
      const canonical = index.canonical(subscription.groupId);
      if (canonical) {
        monitored.add(canonical);
      } else {
        missing.push(subscription.title || subscription.groupId);
      }
    }
    this.monitored = monitored;

    if (missing.length > 0) {
      logger.warn(`[Monitor] Account ${this.accountId} cannot see subscribed groups`, { missing });
    }
    logger.debug(`[Monitor] Account ${this.accountId} resolved ${monitored.size}/${subscriptions.length} groups`, {
      visibleChats: index.size
    });
    return true;
  }

  async handleMessage(message: IncomingMessage): Promise<void> {
    if (this.state !== 'running') return;

    const chatId = this.chats.canonical(message.chatId);
    if (!chatId || !this.monitored.has(chatId)) return;

    const text = message.text.trim();
    if (!text) return;

    const chat = this.chats.get(chatId);
    try {
      const order = await this.options.extractor.extract(
        text,
        {
          chatId,
          chatTitle: chat?.title ?? chatId,
          chatUsername: chat?.username,
          messageId: message.messageId,
          author: resolveAuthor(message.sender, chatId)
        },
        { useAi: this.options.useAi }
      );
      if (order) {
        await this.options.onOrder(order, this.accountId);
      }
    } catch (error) {
      logger.error(`[Monitor] Account ${this.accountId} failed to process message`, {
        chatId,
        messageId: message.messageId,
        error: errorMessage(error)
      });
    }
  }

  /**
   * Threaded reply through this monitor's live connection
   */
  async sendReply(groupId: string, messageId: number, text: string): Promise<void> {
    if (!this.connection) {
      throw new Error(`Monitor ${this.accountId} is not connected`);
    }
    await this.connection.sendReply(this.chats.canonical(groupId) ?? groupId, messageId, text);
  }

  async stop(): Promise<void> {
    this.state = 'stopped';
    const connection = this.connection;
    this.connection = null;
    if (!connection) return;

    try {
      await connection.disconnect();
    } catch (error) {
      logger.warn(`[Monitor] Account ${this.accountId} disconnect failed`, { error: errorMessage(error) });
    }
    logger.info(`[Monitor] Account ${this.accountId} stopped`);
  }
}
