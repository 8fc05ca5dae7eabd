/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core/constants' in other modules.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// MATCHING DEFAULTS
// =============================================================================

/**
 * Driver defaults applied when a record carries no explicit preference
 */
export const DRIVER_DEFAULTS = {
  RADIUS_KM: 50,
  MIN_PRICE: 0,           // 0 = no floor
  QUIET_HOURS_START: '23:00',
  QUIET_HOURS_END: '07:00'
} as const;

// =============================================================================
// ORDER EXTRACTION
// =============================================================================

export const PRICE_BOUNDS = {
  MIN: 500,
  MAX: 500000
} as const;

export const CITY_NAME_MIN_LENGTH = 3;

/** Normalized edit-similarity needed for a fuzzy city match */
export const FUZZY_MATCH_THRESHOLD = 0.85;

export const AI_EXTRACTION = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 1000,
  MAX_DELAY_MS: 8000,
  TEMPERATURE: 0.1,
  MAX_TOKENS: 200,
  CIRCUIT_FAILURE_THRESHOLD: 5,
  CIRCUIT_RESET_TIMEOUT_MS: 60000,
  /** Covers the whole retry sequence, backoff waits included */
  CIRCUIT_REQUEST_TIMEOUT_MS: 60000
} as const;

// =============================================================================
// NOTIFICATION
// =============================================================================

/** Window in which a repeated route edits the existing notification */
export const NOTIFICATION_FRESHNESS_HOURS = 2;

export const ADMIN_EXTRA_PREFIX = '[ADMIN] ';

export const DEFAULT_QUICK_REPLIES = [
  { id: 'default-take', label: 'Взять себе', text: 'я' },
  { id: 'default-other', label: 'Не себе', text: 'не себе' }
] as const;

/** Pending quick-reply actions expire after this long */
export const PENDING_ACTION_TTL_MS = 60 * 1000;

// =============================================================================
// MONITOR FAN-OUT
// =============================================================================

export const MONITOR = {
  ROSTER_REFRESH_INTERVAL_MS: 5 * 60 * 1000,
  RECENT_MESSAGES_CAPACITY: 10000,
  CONNECTION_RETRIES: 5
} as const;

// =============================================================================
// GEOCODING
// =============================================================================

export const GEOCODER = {
  REQUEST_TIMEOUT_MS: 10000,
  CIRCUIT_FAILURE_THRESHOLD: 5,
  CIRCUIT_RESET_TIMEOUT_MS: 60000
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  FORBIDDEN: 403,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Application error codes
 * Format: CATEGORY_SPECIFIC_ERROR
 */
export enum ErrorCode {
  // Configuration (1xxx)
  CONFIG_MISSING = 'CONFIG_1001',

  // Monitoring accounts (2xxx)
  MONITOR_REPLY_FORBIDDEN = 'MONITOR_2001',

  // Delivery (3xxx)
  DELIVERY_SEND_FAILED = 'DELIVERY_3001',
  DELIVERY_REPLY_FAILED = 'DELIVERY_3002',

  // External services (4xxx)
  GEOCODER_UNAVAILABLE = 'EXTERNAL_4001',
  AI_UNAVAILABLE = 'EXTERNAL_4002',
  AI_RATE_LIMITED = 'EXTERNAL_4003',
  AI_INVALID_RESPONSE = 'EXTERNAL_4004',

  // Storage (5xxx)
  DRIVER_NOT_FOUND = 'STORE_5001',

  // General
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE'
}
