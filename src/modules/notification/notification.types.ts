/**
 * =============================================================================
 * NOTIFICATION MODULE - TYPES
 * =============================================================================
 *
 * Contracts between the coordinator and its delivery collaborators.
 * =============================================================================
 */

/**
 * Driver-facing messaging channel (the notification bot)
 */
export interface NotificationChannel {
  /**
   * Send a new notification.
   * @returns the message handle for later edits; throws DeliveryError on failure
   */
  sendNotification(driverId: string, body: string, link: string, groupId: string, messageId: number): Promise<number>;

  /**
   * Replace the body of a previously sent notification.
   * @returns false when the message can no longer be edited
   */
  editNotification(
    driverId: string,
    messageHandle: number,
    body: string,
    link: string,
    groupId: string,
    sourceMessageId: number
  ): Promise<boolean>;
}

/**
 * A monitoring account's stored credential
 */
export interface AccountCredential {
  accountId: string;
  sessionString: string;
}

export type GroupReplyResult =
  | { success: true }
  | { success: false; errorDetail: string; permissionDenied: boolean };

/**
 * Posts a threaded reply in a source group as the driver's own account
 */
export interface GroupReplySender {
  sendGroupReply(credential: AccountCredential, groupId: string, messageId: number, text: string): Promise<GroupReplyResult>;
}

export type NotifyOutcome = 'sent' | 'edited' | 'suppressed' | 'failed';

export type SuppressionReason = 'quiet-hours' | 'busy' | 'blacklisted';

export interface ProcessOrderSummary {
  matched: number;
  sent: number;
  edited: number;
  suppressed: number;
  failed: number;
}
