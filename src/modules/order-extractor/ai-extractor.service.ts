/**
 * =============================================================================
 * ORDER EXTRACTOR - AI FALLBACK
 * =============================================================================
 *
 * Asks an OpenAI-compatible chat completion endpoint for
 * `{point_a, point_b, price}` when no pattern found both cities.
 *
 * Rate limiting (429), 5xx and network errors are retried with exponential
 * backoff (max 3 attempts). Anything else, or a final failure, is
 * "no extraction": the caller gets null and the error is logged.
 *
 * An extraction that still fails after its retries with an outage-type error
 * counts against the 'ai-extraction' circuit breaker; while it is open the
 * endpoint is not called at all.
 * =============================================================================
 */

import { config } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import { retryWithBackoff } from '../../shared/resilience/retry';
import { CircuitBreaker, CircuitTimeoutError, circuitBreakerRegistry } from '../../shared/resilience/circuit-breaker';
import {
  ExternalServiceError,
  RateLimitError,
  errorMessage,
  isRetryableError
} from '../../core/errors/AppError';
import { AI_EXTRACTION, ErrorCode, HTTP_STATUS } from '../../core/constants';
import { aiExtractionSchema, AiExtractionPayload, chatCompletionSchema } from './order.schema';

export type FetchFn = typeof fetch;

const SYSTEM_PROMPT = [
  'Ты извлекаешь данные о междугородней поездке из сообщения в чате такси.',
  'Верни только JSON вида {"point_a": string|null, "point_b": string|null, "price": number|null}.',
  'point_a - город отправления, point_b - город назначения, в именительном падеже, без сокращений.',
  'price - цена в рублях целым числом, если указана, иначе null.',
  'Если это не заказ поездки между населёнными пунктами, верни null во всех полях.'
].join('\n');

export interface AiExtractorOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  fetchFn?: FetchFn;
  /** Injected in tests to skip backoff waits */
  sleep?: (ms: number) => Promise<void>;
  breaker?: CircuitBreaker;
}

export interface AiExtraction {
  pointA: string | null;
  pointB: string | null;
  price: number | null;
}

/**
 * Strip a ```json fence or surrounding prose from the model output
 */
export function extractJsonObject(content: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  const inner = fenced ? fenced[1].trim() : content;
  const braces = /\{[\s\S]*\}/.exec(inner);
  return braces ? braces[0] : inner;
}

export class AiExtractor {
  private readonly fetchFn: FetchFn;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly options: AiExtractorOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.breaker = options.breaker ?? new CircuitBreaker({
      name: 'ai-extraction',
      failureThreshold: AI_EXTRACTION.CIRCUIT_FAILURE_THRESHOLD,
      resetTimeout: AI_EXTRACTION.CIRCUIT_RESET_TIMEOUT_MS,
      requestTimeout: AI_EXTRACTION.CIRCUIT_REQUEST_TIMEOUT_MS,
      isFailure: error => error instanceof CircuitTimeoutError || isRetryableError(error)
    });
    circuitBreakerRegistry.register(this.breaker);
  }

  /**
   * Proposed cities and price, or null when the service gave nothing usable
   */
  async extract(text: string): Promise<AiExtraction | null> {
    let payload: AiExtractionPayload;
    try {
      payload = await this.breaker.execute(() => retryWithBackoff(() => this.complete(text), {
        name: 'ai-extraction',
        maxAttempts: AI_EXTRACTION.MAX_ATTEMPTS,
        baseDelayMs: AI_EXTRACTION.BASE_DELAY_MS,
        maxDelayMs: AI_EXTRACTION.MAX_DELAY_MS,
        shouldRetry: isRetryableError,
        sleep: this.options.sleep
      }));
    } catch (error) {
      logger.warn('[AI] Extraction failed', { error: errorMessage(error) });
      return null;
    }

    return { pointA: payload.point_a, pointB: payload.point_b, price: payload.price };
  }

  private async complete(text: string): Promise<AiExtractionPayload> {
    let response: Awaited<ReturnType<FetchFn>>;
    try {
      response = await this.fetchFn(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: text }
          ],
          response_format: { type: 'json_object' },
          temperature: AI_EXTRACTION.TEMPERATURE,
          max_tokens: AI_EXTRACTION.MAX_TOKENS
        })
      });
    } catch (error) {
      throw new ExternalServiceError('ai', `AI request failed: ${errorMessage(error)}`, true, ErrorCode.AI_UNAVAILABLE);
    }

    if (response.status === HTTP_STATUS.TOO_MANY_REQUESTS) {
      const retryAfter = parseInt(response.headers.get('retry-after') ?? '', 10);
      throw new RateLimitError('AI provider rate limit', Number.isNaN(retryAfter) ? 60 : retryAfter);
    }

    if (!response.ok) {
      throw new ExternalServiceError(
        'ai',
        `AI provider responded with HTTP ${response.status}`,
        response.status >= HTTP_STATUS.INTERNAL_ERROR,
        ErrorCode.AI_UNAVAILABLE,
        { status: response.status }
      );
    }

    const envelope = chatCompletionSchema.safeParse(await response.json());
    if (!envelope.success) {
      throw new ExternalServiceError('ai', 'Unexpected completion shape', false, ErrorCode.AI_INVALID_RESPONSE);
    }

    const content = envelope.data.choices[0].message.content ?? '';
    let raw: unknown;
    try {
      raw = JSON.parse(extractJsonObject(content));
    } catch {
      throw new ExternalServiceError('ai', 'Completion is not JSON', false, ErrorCode.AI_INVALID_RESPONSE);
    }

    const parsed = aiExtractionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExternalServiceError('ai', 'Completion JSON has the wrong shape', false, ErrorCode.AI_INVALID_RESPONSE);
    }
    return parsed.data;
  }
}

/**
 * Extractor from config, or null when no API key is configured
 */
export function createAiExtractor(fetchFn?: FetchFn): AiExtractor | null {
  if (!config.ai.apiKey) return null;
  return new AiExtractor({
    apiKey: config.ai.apiKey,
    baseUrl: config.ai.baseUrl,
    model: config.ai.model,
    fetchFn
  });
}
