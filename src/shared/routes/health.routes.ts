/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (process is up)
 * - GET /health/ready    - Readiness: monitor roster and circuit breakers
 *
 * The geocoder circuit being open degrades extraction (no coordinates) but
 * does not stop the pipeline, so it is reported without failing readiness.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { circuitBreakerRegistry, CircuitState, CircuitStats } from '../resilience/circuit-breaker';
import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';
import { HTTP_STATUS } from '../../core/constants';
import type { MonitorStatus } from '../../modules/monitor/monitor.types';

export interface HealthDependencies {
  monitorStatus: () => MonitorStatus;
  storeStats: () => Record<string, number>;
  /** Monitors started and bot polling */
  isStarted: () => boolean;
}

export interface ReadinessSnapshot {
  status: 'ready' | 'not_ready';
  checks: Record<string, boolean>;
  monitors: MonitorStatus;
  store: Record<string, number>;
  circuitBreakers: CircuitStats[];
  uptimeSeconds: number;
  timestamp: string;
}

const startTime = Date.now();

export function readinessSnapshot(deps: HealthDependencies, now: number = Date.now()): ReadinessSnapshot {
  const circuitBreakers = circuitBreakerRegistry.getAllStats();
  const checks: Record<string, boolean> = {
    started: deps.isStarted(),
    circuits: circuitBreakers.every(cb => cb.state !== CircuitState.OPEN || cb.name === 'geocoder')
  };
  const ready = Object.values(checks).every(Boolean);

  return {
    status: ready ? 'ready' : 'not_ready',
    checks,
    monitors: deps.monitorStatus(),
    store: deps.storeStats(),
    circuitBreakers,
    uptimeSeconds: Math.floor((now - startTime) / 1000),
    timestamp: new Date(now).toISOString()
  };
}

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  router.get('/health/ready', (_req: Request, res: Response) => {
    try {
      const snapshot = readinessSnapshot(deps);
      res.status(snapshot.status === 'ready' ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json(snapshot);
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });
      res.status(HTTP_STATUS.SERVICE_UNAVAILABLE).json({
        status: 'error',
        message: 'Health check failed'
      });
    }
  });

  return router;
}
