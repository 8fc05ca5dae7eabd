/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Missing credentials are fatal: every missing value is listed in one
 * diagnostic and server.ts exits with code 1.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * import { validateAndLogEnvironment } from './core/config/env.validation';
 * validateAndLogEnvironment();
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { ConfigurationError } from '../errors/AppError';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;

/**
 * All environment variables with their requirements
 */
export const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Health endpoint port'
  },

  // ==========================================================================
  // TELEGRAM CREDENTIALS
  // ==========================================================================
  {
    name: 'BOT_TOKEN',
    required: true,
    validator: (v) => v.includes(':'),
    description: 'Notification bot token'
  },
  {
    name: 'TELEGRAM_API_ID',
    required: true,
    validator: isPositiveInt,
    description: 'API id used by monitoring accounts'
  },
  {
    name: 'TELEGRAM_API_HASH',
    required: true,
    description: 'API hash used by monitoring accounts'
  },

  // ==========================================================================
  // STORAGE
  // ==========================================================================
  {
    name: 'DATA_FILE',
    required: false,
    default: 'data/store.json',
    description: 'Path of the JSON document store'
  },

  // ==========================================================================
  // GEOCODER
  // ==========================================================================
  {
    name: 'GEOCODER_ENABLED',
    required: false,
    default: 'true',
    validator: (v) => ['true', 'false'].includes(v),
    description: 'Resolve unknown place names through the external geocoder'
  },
  {
    name: 'GEOCODER_URL',
    required: false,
    default: 'https://nominatim.openstreetmap.org',
    validator: (v) => /^https?:\/\//.test(v),
    description: 'Nominatim-compatible geocoder base URL'
  },

  // ==========================================================================
  // AI FALLBACK
  // ==========================================================================
  {
    name: 'AI_API_KEY',
    required: false,
    description: 'Key for the OpenAI-compatible extraction fallback (disabled when empty)'
  },
  {
    name: 'AI_MODEL',
    required: false,
    default: 'gpt-4o-mini',
    description: 'Chat completion model used for extraction'
  },

  // ==========================================================================
  // PIPELINE
  // ==========================================================================
  {
    name: 'TIMEZONE',
    required: false,
    default: 'Europe/Moscow',
    validator: isValidTimeZone,
    description: 'Timezone for quiet hours'
  },
  {
    name: 'ROSTER_REFRESH_INTERVAL_MS',
    required: false,
    default: '300000',
    validator: isPositiveInt,
    description: 'Monitor roster reconciliation interval'
  },
  {
    name: 'DEDUP_CAPACITY',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'Capacity of the cross-monitor duplicate message set'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'debug'].includes(v),
    description: 'Logging level'
  }
];

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  missing: string[];
  loaded: Record<string, string>;
}

/**
 * Validate environment variables against ENV_VARS
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    missing: [],
    loaded: {}
  };

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.missing.push(envVar.name);
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }

      result.loaded[envVar.name] = finalValue;
    }
  }

  if (!env.AI_API_KEY) {
    result.warnings.push('AI_API_KEY is not set, AI extraction fallback is disabled');
  }

  return result;
}

/**
 * Validate and log results at startup.
 * @throws ConfigurationError listing the missing variables
 */
export function validateAndLogEnvironment(): void {
  console.log('');
  console.log('╔════════════════════════════════════════════════════════════════════╗');
  console.log('║                   ENVIRONMENT VALIDATION                           ║');
  console.log('╚════════════════════════════════════════════════════════════════════╝');

  const result = validateEnvironment();

  if (result.errors.length > 0) {
    console.log('');
    console.log('❌ ERRORS:');
    result.errors.forEach(error => {
      console.log(`   • ${error}`);
      logger.error(`Environment validation error: ${error}`);
    });
  }

  if (result.warnings.length > 0) {
    console.log('');
    console.log('⚠️  WARNINGS:');
    result.warnings.forEach(warning => {
      console.log(`   • ${warning}`);
      logger.warn(`Environment validation warning: ${warning}`);
    });
  }

  if (result.valid) {
    console.log('');
    console.log('✅ Environment validation passed');
    console.log(`   Mode: ${process.env.NODE_ENV || 'development'}`);
    console.log(`   Timezone: ${result.loaded.TIMEZONE}`);
    console.log(`   AI fallback: ${process.env.AI_API_KEY ? 'Enabled' : 'Disabled'}`);
  }

  console.log('');

  if (!result.valid) {
    throw new ConfigurationError(`Environment validation failed with ${result.errors.length} error(s)`, result.missing);
  }
}
