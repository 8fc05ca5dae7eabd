/**
 * =============================================================================
 * MONITOR MODULE - COORDINATOR
 * =============================================================================
 *
 * Runs one AccountMonitor per authorized account.
 *
 * - Every rosterRefreshIntervalMs (5 min): start monitors for newly
 *   authorized accounts, refresh running ones, drop the ones that stopped
 *   or lost authorization. Running monitors are never restarted.
 * - The same (chat, message) seen by several accounts is dispatched once,
 *   tracked in a bounded recency set (oldest evicted first).
 * - A failure in one account, or in the dispatcher, never reaches another.
 * - stop() is final: it waits out a reconciliation in flight, and monitors
 *   that finish starting afterwards are shut down instead of kept.
 *
 * Also the GroupReplySender for quick replies: a running monitor's
 * connection is reused, otherwise a short-lived one is opened.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { RecentSet } from '../../shared/utils/recent-set';
import type { AccountDirectory, AuthorizedAccount } from '../../shared/database/repository.interface';
import { ReplyForbiddenError, errorMessage } from '../../core/errors/AppError';
import { MONITOR } from '../../core/constants';
import type { ParsedOrder } from '../order-extractor/order.types';
import type { AccountCredential, GroupReplyResult, GroupReplySender } from '../notification/notification.types';
import { AccountMonitor } from './account-monitor';
import type {
  MessageExtractor,
  MonitorConnectionFactory,
  MonitorStatus,
  OrderDispatcher
} from './monitor.types';

export interface MonitorCoordinatorOptions {
  directory: AccountDirectory;
  connectionFactory: MonitorConnectionFactory;
  extractor: MessageExtractor;
  dispatcher: OrderDispatcher;
  rosterRefreshIntervalMs?: number;
  dedupCapacity?: number;
  useAi?: boolean;
}

export function messageKey(chatId: string, messageId: number): string {
  return `${chatId}_${messageId}`;
}

export class MonitorCoordinator implements GroupReplySender {
  private readonly monitors = new Map<string, AccountMonitor>();
  private readonly recent: RecentSet;
  private timer: NodeJS.Timeout | null = null;
  private reconciling: Promise<void> | null = null;
  private stopped = false;

  constructor(private readonly options: MonitorCoordinatorOptions) {
    this.recent = new RecentSet(options.dedupCapacity ?? MONITOR.RECENT_MESSAGES_CAPACITY);
  }

  async start(): Promise<void> {
    await this.reconcile();
    if (this.stopped) return;

    const interval = this.options.rosterRefreshIntervalMs ?? MONITOR.ROSTER_REFRESH_INTERVAL_MS;
    this.timer = setInterval(() => {
      this.reconcile().catch(error => {
        logger.error('[Monitor] Roster reconciliation failed', { error: errorMessage(error) });
      });
    }, interval);
    this.timer.unref();
  }

  /**
   * Bring the running set in line with the authorized accounts.
   * Overlapping calls share one pass.
   */
  reconcile(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    if (!this.reconciling) {
      this.reconciling = this.reconcileOnce().finally(() => {
        this.reconciling = null;
      });
    }
    return this.reconciling;
  }

  private async reconcileOnce(): Promise<void> {
    const accounts = await this.options.directory.listAuthorizedAccounts();
    const authorized = new Set(accounts.map(a => a.accountId));

    for (const [accountId, monitor] of this.monitors) {
      if (!authorized.has(accountId) || !monitor.isRunning) {
        await monitor.stop();
        this.monitors.delete(accountId);
      }
    }

    await Promise.all(accounts.map(account => this.reconcileAccount(account)));

    logger.debug('[Monitor] Roster reconciled', { running: this.monitors.size, authorized: accounts.length });
  }

  private async reconcileAccount(account: AuthorizedAccount): Promise<void> {
    try {
      const running = this.monitors.get(account.accountId);
      if (running) {
        if (!(await running.refresh())) {
          this.monitors.delete(account.accountId);
        }
        return;
      }
      if (this.stopped) return;

      const monitor = new AccountMonitor({
        accountId: account.accountId,
        sessionString: account.sessionString,
        connectionFactory: this.options.connectionFactory,
        directory: this.options.directory,
        extractor: this.options.extractor,
        onOrder: order => this.handleOrder(order),
        useAi: this.options.useAi ?? false
      });
      if (!(await monitor.start())) return;
      if (this.stopped) {
        await monitor.stop();
        return;
      }
      this.monitors.set(account.accountId, monitor);
    } catch (error) {
      logger.error(`[Monitor] Account ${account.accountId} reconciliation failed`, { error: errorMessage(error) });
    }
  }

  /**
   * Re-resolve one account's groups after its subscriptions changed
   */
  async refreshAccount(accountId: string): Promise<boolean> {
    const monitor = this.monitors.get(accountId);
    if (!monitor) return false;

    try {
      if (await monitor.refresh()) return true;
    } catch (error) {
      logger.error(`[Monitor] Account ${accountId} refresh failed`, { error: errorMessage(error) });
      await monitor.stop();
    }
    this.monitors.delete(accountId);
    return false;
  }

  /**
   * Dispatch unless another account already delivered this message
   */
  async handleOrder(order: ParsedOrder): Promise<void> {
    if (!this.recent.markIfNew(messageKey(order.sourceGroupId, order.messageId))) {
      logger.debug('[Monitor] Duplicate message skipped', { sourceLink: order.sourceLink });
      return;
    }

    try {
      await this.options.dispatcher(order);
    } catch (error) {
      logger.error('[Monitor] Order dispatch failed', { sourceLink: order.sourceLink, error: errorMessage(error) });
    }
  }

  async sendGroupReply(
    credential: AccountCredential,
    groupId: string,
    messageId: number,
    text: string
  ): Promise<GroupReplyResult> {
    try {
      const running = this.monitors.get(credential.accountId);
      if (running?.isRunning) {
        await running.sendReply(groupId, messageId, text);
        return { success: true };
      }
      return await this.replyThroughTemporaryConnection(credential, groupId, messageId, text);
    } catch (error) {
      return {
        success: false,
        errorDetail: errorMessage(error),
        permissionDenied: error instanceof ReplyForbiddenError
      };
    }
  }

  private async replyThroughTemporaryConnection(
    credential: AccountCredential,
    groupId: string,
    messageId: number,
    text: string
  ): Promise<GroupReplyResult> {
    const connection = this.options.connectionFactory(credential.sessionString);
    try {
      await connection.connect();
      if (!(await connection.isAuthorized())) {
        return { success: false, errorDetail: 'Сессия устарела, авторизуйтесь заново', permissionDenied: false };
      }
      // Loads the account's dialogs so the chat entity can be resolved
      await connection.listChats();
      await connection.sendReply(groupId, messageId, text);
      return { success: true };
    } finally {
      try {
        await connection.disconnect();
      } catch (error) {
        logger.warn('[Monitor] Temporary connection disconnect failed', { error: errorMessage(error) });
      }
    }
  }

  status(): MonitorStatus {
    return {
      running: this.monitors.size,
      accounts: Array.from(this.monitors.values(), m => ({ accountId: m.accountId, monitoredGroups: m.monitoredGroups })),
      recentMessages: this.recent.size
    };
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.reconciling) {
      try {
        await this.reconciling;
      } catch (error) {
        logger.error('[Monitor] Reconciliation in flight failed during stop', { error: errorMessage(error) });
      }
    }
    const monitors = Array.from(this.monitors.values());
    this.monitors.clear();
    await Promise.all(monitors.map(m => m.stop()));
    logger.info('[Monitor] All monitors stopped');
  }
}
