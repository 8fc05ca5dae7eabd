/**
 * =============================================================================
 * HEALTH & STARTUP VALIDATION - Tests
 * =============================================================================
 */

import { readinessSnapshot, HealthDependencies } from '../shared/routes/health.routes';
import { CircuitBreaker, circuitBreakerRegistry } from '../shared/resilience/circuit-breaker';
import { validateEnvironment } from '../core/config/env.validation';
import type { MonitorStatus } from '../modules/monitor/monitor.types';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const MONITORS: MonitorStatus = { running: 1, accounts: [{ accountId: 'driver-1', monitoredGroups: 3 }], recentMessages: 12 };

function deps(started: boolean = true): HealthDependencies {
  return {
    monitorStatus: () => MONITORS,
    storeStats: () => ({ drivers: 1, subscriptions: 3, orders: 0, notifications: 0 }),
    isStarted: () => started
  };
}

async function tripped(name: string): Promise<CircuitBreaker> {
  const breaker = new CircuitBreaker({ name, failureThreshold: 1 });
  circuitBreakerRegistry.register(breaker);
  await expect(breaker.execute(() => Promise.reject(new Error('down')))).rejects.toThrow('down');
  return breaker;
}

// =============================================================================
// READINESS
// =============================================================================

describe('readinessSnapshot', () => {
  it('should be ready once started with no open circuits', () => {
    const now = Date.now() + 5000;
    const snapshot = readinessSnapshot(deps(), now);

    expect(snapshot.status).toBe('ready');
    expect(snapshot.checks).toEqual({ started: true, circuits: true });
    expect(snapshot.monitors).toEqual(MONITORS);
    expect(snapshot.store.subscriptions).toBe(3);
    expect(snapshot.uptimeSeconds).toBeGreaterThanOrEqual(5);
    expect(snapshot.timestamp).toBe(new Date(now).toISOString());
  });

  it('should not be ready before startup completes', () => {
    expect(readinessSnapshot(deps(false)).status).toBe('not_ready');
  });

  it('should stay ready while only the geocoder circuit is open', async () => {
    const geocoder = await tripped('geocoder');

    const snapshot = readinessSnapshot(deps());
    expect(snapshot.status).toBe('ready');
    expect(snapshot.circuitBreakers.map(cb => [cb.name, cb.state])).toEqual([['geocoder', 'OPEN']]);
    geocoder.reset();
  });

  it('should not be ready while another circuit is open', async () => {
    const ai = await tripped('ai-extraction');

    const snapshot = readinessSnapshot(deps());
    expect(snapshot.status).toBe('not_ready');
    expect(snapshot.checks.circuits).toBe(false);
    ai.reset();
  });
});

// =============================================================================
// ENVIRONMENT
// =============================================================================

describe('validateEnvironment', () => {
  const complete = {
    BOT_TOKEN: '123456:test-token',
    TELEGRAM_API_ID: '12345',
    TELEGRAM_API_HASH: 'test-hash'
  };

  it('should list every missing credential at once', () => {
    const result = validateEnvironment({});

    expect(result.valid).toBe(false);
    expect(result.missing).toEqual(['BOT_TOKEN', 'TELEGRAM_API_ID', 'TELEGRAM_API_HASH']);
    expect(result.errors[0]).toBe('Missing required environment variable: BOT_TOKEN - Notification bot token');
  });

  it('should apply defaults and warn when the AI fallback is off', () => {
    const result = validateEnvironment(complete);

    expect(result.valid).toBe(true);
    expect(result.loaded).toMatchObject({
      NODE_ENV: 'development',
      PORT: '3000',
      TIMEZONE: 'Europe/Moscow',
      DEDUP_CAPACITY: '10000'
    });
    expect(result.warnings).toEqual(['AI_API_KEY is not set, AI extraction fallback is disabled']);
  });

  it('should reject malformed values', () => {
    const result = validateEnvironment({ ...complete, TIMEZONE: 'Mars/Olympus', TELEGRAM_API_ID: 'abc' });

    expect(result.valid).toBe(false);
    expect(result.missing).toEqual([]);
    expect(result.errors).toEqual([
      'Invalid value for TELEGRAM_API_ID: "abc" - API id used by monitoring accounts',
      'Invalid value for TIMEZONE: "Mars/Olympus" - Timezone for quiet hours'
    ]);
  });
});
