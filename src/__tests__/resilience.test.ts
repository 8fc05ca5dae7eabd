/**
 * =============================================================================
 * RESILIENCE - Tests
 * =============================================================================
 */

import {
  CircuitBreaker,
  CircuitOpenError,
  CircuitState
} from '../shared/resilience/circuit-breaker';
import { backoffDelay, retryWithBackoff } from '../shared/resilience/retry';
import { ExternalServiceError, isRetryableError } from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const fail = (): Promise<never> => Promise.reject(new Error('boom'));
const succeed = (): Promise<string> => Promise.resolve('ok');

// =============================================================================
// CIRCUIT BREAKER
// =============================================================================

describe('CircuitBreaker', () => {
  let clock: number;
  let transitions: string[];
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = 0;
    transitions = [];
    breaker = new CircuitBreaker({
      name: 'test-breaker',
      failureThreshold: 2,
      successThreshold: 2,
      resetTimeout: 1000,
      now: () => clock,
      onStateChange: (from, to) => transitions.push(`${from}->${to}`)
    });
  });

  async function trip(): Promise<void> {
    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    await expect(breaker.execute(fail)).rejects.toThrow('boom');
  }

  it('should open after the failure threshold', async () => {
    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);

    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getStats()).toMatchObject({ name: 'test-breaker', failures: 2, nextAttemptTime: 1000 });
  });

  it('should reject immediately while open', async () => {
    await trip();
    const fn = jest.fn(succeed);

    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should close after enough half-open successes', async () => {
    await trip();
    clock = 1000;

    await expect(breaker.execute(succeed)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await expect(breaker.execute(succeed)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(transitions).toEqual(['CLOSED->OPEN', 'OPEN->HALF_OPEN', 'HALF_OPEN->CLOSED']);
  });

  it('should reopen on a half-open failure', async () => {
    await trip();
    clock = 1000;

    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getStats().nextAttemptTime).toBe(2000);
  });

  it('should ignore errors the classifier does not count', async () => {
    const lenient = new CircuitBreaker({
      name: 'lenient',
      failureThreshold: 1,
      isFailure: error => !(error instanceof TypeError)
    });

    await expect(lenient.execute(() => Promise.reject(new TypeError('bad input')))).rejects.toThrow('bad input');
    expect(lenient.getState()).toBe(CircuitState.CLOSED);
    expect(lenient.getStats().failures).toBe(0);
  });

  it('should time out slow calls', async () => {
    const slow = new CircuitBreaker({ name: 'slow', requestTimeout: 10 });
    const never = (): Promise<string> => new Promise(resolve => setTimeout(() => resolve('late'), 50));

    await expect(slow.execute(never)).rejects.toThrow("Circuit breaker 'slow' request timed out after 10ms");
  });
});

// =============================================================================
// RETRY
// =============================================================================

describe('retryWithBackoff', () => {
  it('should double the delay up to the cap', () => {
    expect(backoffDelay(1, 1000, 5000)).toBe(1000);
    expect(backoffDelay(3, 1000, 5000)).toBe(4000);
    expect(backoffDelay(4, 1000, 5000)).toBe(5000);
  });

  it('should retry until the call succeeds', async () => {
    const sleep = jest.fn((_ms: number) => Promise.resolve());
    const fn = jest.fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('done');

    await expect(retryWithBackoff(fn, { name: 'test', maxAttempts: 3, baseDelayMs: 100, sleep })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should rethrow the last error when attempts run out', async () => {
    const sleep = jest.fn((_ms: number) => Promise.resolve());
    const fn = jest.fn(fail);

    await expect(retryWithBackoff(fn, { name: 'test', maxAttempts: 2, sleep })).rejects.toThrow('boom');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should not retry errors the predicate rejects', async () => {
    const sleep = jest.fn((_ms: number) => Promise.resolve());
    const fn = jest.fn(() => Promise.reject(new ExternalServiceError('ai', 'bad request', false)));

    await expect(retryWithBackoff(fn, { name: 'test', maxAttempts: 3, shouldRetry: isRetryableError, sleep }))
      .rejects.toBeInstanceOf(ExternalServiceError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
