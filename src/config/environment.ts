/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Required credentials are checked by env.validation.ts at startup
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { MONITOR, NOTIFICATION_FRESHNESS_HOURS } from '../core/constants';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Application configuration object
 * Required values are validated at startup (see core/config/env.validation.ts)
 */
export const config = {
  nodeEnv: getOptional('NODE_ENV', 'development'),
  port: getNumber('PORT', 3000),

  // Notification bot
  bot: {
    token: getOptional('BOT_TOKEN', ''),
  },

  // Monitoring accounts (user API credentials)
  telegram: {
    apiId: getNumber('TELEGRAM_API_ID', 0),
    apiHash: getOptional('TELEGRAM_API_HASH', ''),
  },

  // JSON document store
  storage: {
    dataFile: getOptional('DATA_FILE', 'data/store.json'),
  },

  // Nominatim-compatible geocoder
  geocoder: {
    enabled: getBoolean('GEOCODER_ENABLED', true),
    baseUrl: getOptional('GEOCODER_URL', 'https://nominatim.openstreetmap.org'),
    userAgent: getOptional('GEOCODER_USER_AGENT', 'intercity-ride-scout/1.0'),
    country: getOptional('GEOCODER_COUNTRY', 'Россия'),
    countryCode: getOptional('GEOCODER_COUNTRY_CODE', 'ru'),
  },

  // OpenAI-compatible extraction fallback
  ai: {
    apiKey: getOptional('AI_API_KEY', ''),
    baseUrl: getOptional('AI_BASE_URL', 'https://api.openai.com/v1'),
    model: getOptional('AI_MODEL', 'gpt-4o-mini'),
  },

  // Pipeline
  timezone: getOptional('TIMEZONE', 'Europe/Moscow'),
  monitor: {
    rosterRefreshIntervalMs: getNumber('ROSTER_REFRESH_INTERVAL_MS', MONITOR.ROSTER_REFRESH_INTERVAL_MS),
    dedupCapacity: getNumber('DEDUP_CAPACITY', MONITOR.RECENT_MESSAGES_CAPACITY),
    filterByGroup: getBoolean('FILTER_BY_GROUP', true),
  },
  notification: {
    windowHours: getNumber('NOTIFICATION_WINDOW_HOURS', NOTIFICATION_FRESHNESS_HOURS),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // Feature flags
  isProduction: getOptional('NODE_ENV', 'development') === 'production',
  isDevelopment: getOptional('NODE_ENV', 'development') === 'development',
};

export type AppConfig = typeof config;
