/**
 * =============================================================================
 * MONITOR MODULE - TYPES
 * =============================================================================
 *
 * The live per-account event stream the fan-out consumes. The GramJS
 * implementation lives in gramjs-connection.ts; tests use an in-process fake.
 * =============================================================================
 */

import type { ChatKind } from '../../shared/utils/chat-id.utils';
import type { ExtractOptions, MessageSource, ParsedOrder } from '../order-extractor/order.types';

export interface VisibleChat {
  /** Canonical (marked) chat id */
  id: string;
  title: string;
  username?: string;
  kind: ChatKind;
}

/**
 * Who sent a message. A post made "as the channel" has kind 'chat'; a
 * signature on such a post arrives in postAuthor.
 */
export interface SenderInfo {
  kind: 'user' | 'chat' | 'unknown';
  id?: string;
  username?: string;
  firstName?: string;
  postAuthor?: string;
}

export interface IncomingMessage {
  /** Any encoding of the chat id */
  chatId: string;
  messageId: number;
  text: string;
  sender: SenderInfo;
}

export type MessageHandler = (message: IncomingMessage) => Promise<void>;

export interface MonitorConnection {
  connect(): Promise<void>;
  isAuthorized(): Promise<boolean>;
  /** Groups and channels visible to the account */
  listChats(): Promise<VisibleChat[]>;
  onMessage(handler: MessageHandler): void;
  /** Throws ReplyForbiddenError when the account may not post in the chat */
  sendReply(chatId: string, replyToMessageId: number, text: string): Promise<void>;
  disconnect(): Promise<void>;
}

export type MonitorConnectionFactory = (sessionString: string) => MonitorConnection;

/**
 * The part of the order extractor a monitor needs
 */
export interface MessageExtractor {
  extract(text: string, source: MessageSource, options?: ExtractOptions): Promise<ParsedOrder | null>;
}

/**
 * Receives every extracted order once, whichever account saw it first
 */
export type OrderDispatcher = (order: ParsedOrder) => Promise<unknown>;

export interface MonitorStatus {
  running: number;
  accounts: Array<{ accountId: string; monitoredGroups: number }>;
  recentMessages: number;
}
