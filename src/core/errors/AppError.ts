/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the whole pipeline.
 *
 * USAGE:
 * ```typescript
 * // In an external-service client
 * throw new RateLimitError('AI provider quota exceeded', 20);
 *
 * // At a pipeline boundary
 * if (isRetryableError(error)) { ... }
 * ```
 *
 * Errors carry a stable code so log lines and the health endpoint can be
 * filtered without parsing messages.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Missing or invalid configuration. Not operational: the process cannot run.
 */
export class ConfigurationError extends AppError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.CONFIG_MISSING, false, { missing });
    this.missing = missing;
  }
}

/**
 * A dependency (geocoder, AI provider, messaging API) failed.
 * `retryable` tells callers whether a backoff retry makes sense.
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly retryable: boolean;

  constructor(
    service: string,
    message: string,
    retryable: boolean = false,
    code: ErrorCode | string = ErrorCode.SERVICE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, { service, ...details });
    this.service = service;
    this.retryable = retryable;
  }
}

/**
 * 429 from an upstream provider
 */
export class RateLimitError extends ExternalServiceError {
  public readonly retryAfter: number;

  constructor(message: string = 'Too many requests', retryAfter: number = 60, service: string = 'ai') {
    super(service, message, true, ErrorCode.AI_RATE_LIMITED, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

/**
 * Sending or editing a driver notification failed
 */
export class DeliveryError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DELIVERY_SEND_FAILED,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_GATEWAY, code, true, details);
  }
}

/**
 * The monitoring account lacks rights to post in a group
 * (banned, read-only, admin-only posting)
 */
export class ReplyForbiddenError extends AppError {
  constructor(groupId: string, reason: string) {
    super(`Reply not permitted in group ${groupId}: ${reason}`, HTTP_STATUS.FORBIDDEN, ErrorCode.MONITOR_REPLY_FORBIDDEN, true, { groupId });
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

export function isRetryableError(error: unknown): boolean {
  return error instanceof ExternalServiceError && error.retryable;
}

/**
 * Message of any thrown value, for log metadata
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
