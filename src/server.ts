/**
 * =============================================================================
 * INTERCITY RIDE SCOUT - MAIN SERVER
 * =============================================================================
 *
 * Watches taxi chat groups through drivers' own accounts, extracts intercity
 * ride orders and notifies matching drivers through the bot.
 *
 * PIPELINE:
 * ┌──────────────────────────────────────────────────────────────────────────┐
 * │ MONITOR      │ one listener per authorized account, fleet-wide dedup     │
 * │ EXTRACTOR    │ cities + price from free text, AI fallback                │
 * │ MATCHING     │ radius / price floor, admin sweep                         │
 * │ NOTIFICATION │ send or edit per driver and route, quick replies          │
 * │ GEO          │ geocoding with cache, great-circle distance               │
 * └──────────────────────────────────────────────────────────────────────────┘
 *
 * HTTP is only used for health checks.
 * =============================================================================
 */

import express from 'express';
import { createServer } from 'http';

import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { ConfigurationError, errorMessage } from './core/errors/AppError';
import { DatabaseService } from './shared/database/db';
import { createHealthRouter } from './shared/routes/health.routes';
import { GeoService } from './modules/geo/geo.service';
import { createNominatimClient } from './modules/geo/nominatim.client';
import { OrderExtractor } from './modules/order-extractor/order-extractor.service';
import { createAiExtractor } from './modules/order-extractor/ai-extractor.service';
import { DriverMatcher } from './modules/matching/driver-matcher.service';
import { NotificationCoordinator } from './modules/notification/notification-coordinator.service';
import { ReplyService } from './modules/notification/reply.service';
import { TelegramDeliveryChannel, createNotificationBot } from './modules/notification/telegram-delivery';
import { MonitorCoordinator } from './modules/monitor/monitor-coordinator.service';
import { createGramjsConnection } from './modules/monitor/gramjs-connection';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
try {
  validateAndLogEnvironment();
} catch (error) {
  logger.error('Environment validation failed. Exiting.', {
    error: errorMessage(error),
    missing: error instanceof ConfigurationError ? error.missing : []
  });
  process.exit(1);
}

// =============================================================================
// WIRING
// =============================================================================

const store = new DatabaseService(config.storage.dataFile);
const geo = new GeoService({ geocoder: config.geocoder.enabled ? createNominatimClient() : null });
const ai = createAiExtractor();
const extractor = new OrderExtractor({ geo, ai });
const matcher = new DriverMatcher(store, geo, { filterByGroup: config.monitor.filterByGroup });

const monitors = new MonitorCoordinator({
  directory: store,
  connectionFactory: createGramjsConnection,
  extractor,
  dispatcher: order => notifications.processOrder(order),
  rosterRefreshIntervalMs: config.monitor.rosterRefreshIntervalMs,
  dedupCapacity: config.monitor.dedupCapacity,
  useAi: ai !== null
});

const replies = new ReplyService(store, monitors);
const delivery = new TelegramDeliveryChannel(createNotificationBot(config.bot.token), store, replies);
const notifications: NotificationCoordinator = new NotificationCoordinator(store, matcher, delivery, {
  timezone: config.timezone,
  windowHours: config.notification.windowHours
});

let started = false;

// =============================================================================
// HTTP (health only)
// =============================================================================

const app = express();
app.use(createHealthRouter({
  monitorStatus: () => monitors.status(),
  storeStats: () => store.getStats(),
  isStarted: () => started
}));
const server = createServer(app);

async function bootstrap(): Promise<void> {
  delivery.launch();
  await monitors.start();
  started = true;

  server.listen(config.port, () => {
    logger.info(`Server started on port ${config.port}`, {
      environment: config.nodeEnv,
      monitors: monitors.status().running,
      aiFallback: ai !== null,
      geocoder: config.geocoder.enabled
    });
  });
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { error: errorMessage(reason) });
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = async (signal: string): Promise<void> => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();

  delivery.stop(signal);

  try {
    await monitors.stop();
  } catch (error) {
    logger.error('Error stopping monitors', { error: errorMessage(error) });
  }

  await store.flush();

  server.close(() => {
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });
};

const onSignal = (signal: string) => () => {
  gracefulShutdown(signal).catch(error => {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  });
};

process.on('SIGTERM', onSignal('SIGTERM'));
process.on('SIGINT', onSignal('SIGINT'));

bootstrap().catch(error => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
