/**
 * =============================================================================
 * CIRCUIT BREAKER - Graceful Failure Handling
 * =============================================================================
 *
 * Stops hammering an external service once it keeps failing.
 *
 * STATES:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Service is failing, requests are rejected immediately
 * - HALF_OPEN: Testing if service has recovered
 *
 * The geocoder runs behind one of these: while it is OPEN, lookups of
 * unknown places degrade to "no coordinates" without a network round trip.
 *
 * USAGE:
 * ```typescript
 * const breaker = new CircuitBreaker({ name: 'geocoder', failureThreshold: 5 });
 * const result = await breaker.execute(() => fetchPlace(name));
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Number of failures before opening circuit */
  failureThreshold?: number;
  /** Number of successes in half-open to close circuit */
  successThreshold?: number;
  /** Time to wait before trying again (ms) */
  resetTimeout?: number;
  /** Timeout for individual requests (ms) */
  requestTimeout?: number;
  /** Function to determine if error should count as failure */
  isFailure?: (error: unknown) => boolean;
  /** Callback when state changes */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  /** Clock, injectable for tests */
  now?: () => number;
}

const DEFAULT_OPTIONS = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeout: 30000,
  requestTimeout: 10000
};

/**
 * Error thrown when circuit is open
 */
export class CircuitOpenError extends Error {
  constructor(public circuitName: string) {
    super(`Circuit breaker '${circuitName}' is OPEN - service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Error thrown when request times out
 */
export class CircuitTimeoutError extends Error {
  constructor(public circuitName: string, public timeout: number) {
    super(`Circuit breaker '${circuitName}' request timed out after ${timeout}ms`);
    this.name = 'CircuitTimeoutError';
  }
}

export interface CircuitStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  nextAttemptTime: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number = 0;
  private successes: number = 0;
  private lastFailureTime: number = 0;
  private nextAttemptTime: number = 0;
  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly resetTimeout: number;
  private readonly requestTimeout: number;
  private readonly isFailure?: (error: unknown) => boolean;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? DEFAULT_OPTIONS.failureThreshold;
    this.successThreshold = options.successThreshold ?? DEFAULT_OPTIONS.successThreshold;
    this.resetTimeout = options.resetTimeout ?? DEFAULT_OPTIONS.resetTimeout;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_OPTIONS.requestTimeout;
    this.isFailure = options.isFailure;
    this.onStateChange = options.onStateChange;
    this.now = options.now ?? Date.now;
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.now() >= this.nextAttemptTime) {
        this.transitionTo(CircuitState.HALF_OPEN);
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    try {
      const result = await this.executeWithTimeout(fn);
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  private executeWithTimeout<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        reject(new CircuitTimeoutError(this.name, this.requestTimeout));
      }, this.requestTimeout);

      fn()
        .then((result) => {
          clearTimeout(timeoutId);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeoutId);
          reject(error);
        });
    });
  }

  private recordSuccess(): void {
    this.failures = 0;
    this.successes++;

    if (this.state === CircuitState.HALF_OPEN && this.successes >= this.successThreshold) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  private recordFailure(error: unknown): void {
    if (this.isFailure && !this.isFailure(error)) {
      return;
    }

    this.successes = 0;
    this.failures++;
    this.lastFailureTime = this.now();

    logger.warn(`Circuit '${this.name}' failure ${this.failures}/${this.failureThreshold}`, {
      error: errorMessage(error)
    });

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in half-open immediately opens the circuit
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;

    logger.info(`Circuit '${this.name}' state change: ${oldState} -> ${newState}`);

    if (newState === CircuitState.OPEN) {
      this.nextAttemptTime = this.now() + this.resetTimeout;
      logger.warn(`Circuit '${this.name}' OPEN - will retry at ${new Date(this.nextAttemptTime).toISOString()}`);
    } else if (newState === CircuitState.CLOSED) {
      this.failures = 0;
      this.successes = 0;
    } else {
      this.successes = 0;
    }

    if (this.onStateChange) {
      this.onStateChange(oldState, newState);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitStats {
    return {
      name: this.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime || null,
      nextAttemptTime: this.state === CircuitState.OPEN ? this.nextAttemptTime : null
    };
  }

  /**
   * Manually reset the circuit to closed state
   */
  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
  }
}

// =============================================================================
// CIRCUIT BREAKER REGISTRY
// =============================================================================

/**
 * Registry of live breakers, read by the health endpoint
 */
class CircuitBreakerRegistry {
  private breakers: Map<string, CircuitBreaker> = new Map();

  register(breaker: CircuitBreaker): void {
    this.breakers.set(breaker.getStats().name, breaker);
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  getAllStats(): CircuitStats[] {
    return Array.from(this.breakers.values()).map(b => b.getStats());
  }
}

export const circuitBreakerRegistry = new CircuitBreakerRegistry();
