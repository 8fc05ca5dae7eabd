/**
 * =============================================================================
 * AI EXTRACTOR - Tests
 * =============================================================================
 *
 * Retry policy against a fake chat-completion endpoint (no network).
 * =============================================================================
 */

import { AiExtractor, FetchFn, extractJsonObject } from '../modules/order-extractor/ai-extractor.service';
import { CircuitBreaker, CircuitState, circuitBreakerRegistry } from '../shared/resilience/circuit-breaker';
import { isRetryableError } from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function completion(content: string, status: number = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function status(code: number, headers: Record<string, string> = {}): Response {
  return new Response('{}', { status: code, headers });
}

function scriptedFetch(steps: Array<Response | Error>) {
  const queue = [...steps];
  return jest.fn<Promise<Response>, Parameters<FetchFn>>(async () => {
    const next = queue.shift();
    if (!next) throw new Error('no scripted response left');
    if (next instanceof Error) throw next;
    return next;
  });
}

function createExtractor(fetchFn: FetchFn, breaker?: CircuitBreaker) {
  const sleep = jest.fn(async (_ms: number) => undefined);
  const extractor = new AiExtractor({
    apiKey: 'test-secret',
    baseUrl: 'http://ai.test/v1',
    model: 'test-model',
    fetchFn,
    sleep,
    breaker
  });
  return { extractor, sleep };
}

const GOOD = '{"point_a": "Уфа", "point_b": "Казань", "price": "3 000"}';

describe('AiExtractor', () => {
  it('should post the message and parse the proposal', async () => {
    const fetchFn = scriptedFetch([completion(GOOD)]);
    const { extractor } = createExtractor(fetchFn);

    await expect(extractor.extract('Уфа Казань завтра')).resolves.toEqual({
      pointA: 'Уфа',
      pointB: 'Казань',
      price: 3000
    });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('http://ai.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json'
    });
  });

  it('should retry after a rate limit and then succeed', async () => {
    const fetchFn = scriptedFetch([status(429, { 'retry-after': '2' }), completion(GOOD)]);
    const { extractor, sleep } = createExtractor(fetchFn);

    const result = await extractor.extract('Уфа Казань');

    expect(result?.pointA).toBe('Уфа');
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('should give up after three server errors with growing delays', async () => {
    const fetchFn = scriptedFetch([status(500), status(502), status(503)]);
    const { extractor, sleep } = createExtractor(fetchFn);

    await expect(extractor.extract('Уфа Казань')).resolves.toBeNull();
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('should stop calling the endpoint while the circuit is open', async () => {
    const fetchFn = scriptedFetch([status(500), status(500), status(500), completion(GOOD)]);
    const breaker = new CircuitBreaker({ name: 'ai-extraction', failureThreshold: 1, isFailure: isRetryableError });
    const { extractor } = createExtractor(fetchFn, breaker);

    await expect(extractor.extract('Уфа Казань')).resolves.toBeNull();
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    await expect(extractor.extract('Уфа Казань')).resolves.toBeNull();
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('should not count a client error against the registered circuit', async () => {
    const fetchFn = scriptedFetch([status(400)]);
    const { extractor } = createExtractor(fetchFn);

    await expect(extractor.extract('Уфа Казань')).resolves.toBeNull();
    expect(circuitBreakerRegistry.get('ai-extraction')?.getStats()).toMatchObject({ state: CircuitState.CLOSED, failures: 0 });
  });

  it('should retry a network failure', async () => {
    const fetchFn = scriptedFetch([new Error('ECONNRESET'), completion(GOOD)]);
    const { extractor } = createExtractor(fetchFn);

    await expect(extractor.extract('Уфа Казань')).resolves.toEqual({ pointA: 'Уфа', pointB: 'Казань', price: 3000 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should not retry a client error', async () => {
    const fetchFn = scriptedFetch([status(400)]);
    const { extractor, sleep } = createExtractor(fetchFn);

    await expect(extractor.extract('Уфа Казань')).resolves.toBeNull();
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry content that is not JSON', async () => {
    const fetchFn = scriptedFetch([completion('Не могу определить маршрут')]);
    const { extractor } = createExtractor(fetchFn);

    await expect(extractor.extract('привет')).resolves.toBeNull();
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should accept fenced JSON and empty fields', async () => {
    const fetchFn = scriptedFetch([completion('```json\n{"point_a": "Пермь", "point_b": "", "price": null}\n```')]);
    const { extractor } = createExtractor(fetchFn);

    await expect(extractor.extract('Пермь')).resolves.toEqual({ pointA: 'Пермь', pointB: null, price: null });
  });
});

describe('extractJsonObject', () => {
  it('should strip prose around the object', () => {
    expect(extractJsonObject('Вот ответ: {"a":1} спасибо')).toBe('{"a":1}');
  });

  it('should unwrap a code fence', () => {
    expect(extractJsonObject('```\n{"a":1}\n```')).toBe('{"a":1}');
  });
});
