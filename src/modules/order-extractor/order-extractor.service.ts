/**
 * =============================================================================
 * ORDER EXTRACTOR - SERVICE
 * =============================================================================
 *
 * Message → ParsedOrder | null.
 *
 *   gate → location strategies → (AI fallback) → city validation
 *        → price → coordinates → region → source link
 *
 * Ambiguous or malformed text is "not an order": null is returned and the
 * miss is logged at debug. Nothing in here throws on bad input.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { linkChatId } from '../../shared/utils/chat-id.utils';
import type { Coordinates } from '../../shared/utils/geospatial.utils';
import { CITY_NAME_MIN_LENGTH, PRICE_BOUNDS } from '../../core/constants';
import { CityDictionary, getCityDictionary } from './city-dictionary';
import { LABEL_A, LABEL_B, extractLocations } from './location-extractor';
import { extractPrice } from './price-extractor';
import type { AiExtractor } from './ai-extractor.service';
import type {
  ExtractOptions,
  ExtractionMethod,
  MessageSource,
  ParsedOrder,
  RoutePoints
} from './order.types';

/**
 * The part of the geo service the extractor needs
 */
export interface PlaceResolver {
  resolve(name: string): Promise<Coordinates | null>;
}

export interface OrderExtractorDeps {
  geo: PlaceResolver;
  ai?: AiExtractor | null;
  dictionary?: CityDictionary;
}

const DASH_GATE = /[А-Яа-яЁё]+\s*[-–—→>]\s*[А-Яа-яЁё]+/;
const PREPOSITION_GATE = /(?<![A-Za-zА-Яа-яЁё])(?:из|от|с)\s+[А-Яа-яЁё-]+\s+(?:в|до|на|к)\s+[А-Яа-яЁё]+/i;

function boundedPrice(value: number | null): number | null {
  if (value === null || value < PRICE_BOUNDS.MIN || value > PRICE_BOUNDS.MAX) return null;
  return value;
}

/**
 * Route key: one logical trip direction. Not symmetric.
 */
export function normalizeRouteKey(pointA: string, pointB: string): string {
  return `${pointA.trim().toLowerCase()}:${pointB.trim().toLowerCase()}`;
}

/**
 * Deep link to a message: public username when known, private c/ link otherwise
 */
export function buildSourceLink(source: Pick<MessageSource, 'chatId' | 'chatUsername' | 'messageId'>): string {
  if (source.chatUsername) {
    return `https://t.me/${source.chatUsername.replace(/^@/, '')}/${source.messageId}`;
  }
  return `https://t.me/c/${linkChatId(source.chatId)}/${source.messageId}`;
}

export class OrderExtractor {
  private readonly geo: PlaceResolver;
  private readonly ai: AiExtractor | null;
  private readonly dictionary: CityDictionary;

  constructor(deps: OrderExtractorDeps) {
    this.geo = deps.geo;
    this.ai = deps.ai ?? null;
    this.dictionary = deps.dictionary ?? getCityDictionary();
  }

  // ===========================================================================
  // GATE
  // ===========================================================================

  isClosedOrder(text: string): boolean {
    return this.dictionary.hasClosedMarker(text);
  }

  /**
   * Cheap pre-filter, not final validation
   */
  isOrderCandidate(text: string): boolean {
    if (!text.trim() || this.isClosedOrder(text)) return false;
    if (this.dictionary.hasOrderKeyword(text)) return true;
    if (DASH_GATE.test(text) || PREPOSITION_GATE.test(text)) return true;

    const labelA = LABEL_A.exec(text);
    return labelA !== null && LABEL_B.test(text.slice(labelA.index + labelA[0].length));
  }

  // ===========================================================================
  // VALIDATION
  // ===========================================================================

  /**
   * ≥3 chars, no leading digit, not a stopword; and known or geocodable
   */
  async isValidCity(name: string): Promise<boolean> {
    const value = name.trim();
    if (value.length < CITY_NAME_MIN_LENGTH) return false;
    if (/^\d/.test(value)) return false;
    if (this.dictionary.isStopword(value)) return false;
    if (this.dictionary.isKnown(value)) return true;
    return (await this.geo.resolve(value)) !== null;
  }

  // ===========================================================================
  // EXTRACTION
  // ===========================================================================

  async extract(text: string, source: MessageSource, options: ExtractOptions = {}): Promise<ParsedOrder | null> {
    if (!this.isOrderCandidate(text)) {
      return null;
    }

    let route: RoutePoints | null = null;
    let method: ExtractionMethod | null = null;
    let price = extractPrice(text);

    const pattern = extractLocations(text, this.dictionary);
    if (pattern && await this.isValidRoute(pattern)) {
      route = pattern;
      method = pattern.method;
    } else if (pattern) {
      logger.debug('[Extractor] Pattern cities failed validation', { pointA: pattern.pointA, pointB: pattern.pointB });
    }

    if (!route && options.useAi && this.ai) {
      const proposal = await this.ai.extract(text);
      if (proposal?.pointA && proposal.pointB) {
        const candidate: RoutePoints = {
          pointA: this.dictionary.canonicalize(proposal.pointA) ?? proposal.pointA,
          pointB: this.dictionary.canonicalize(proposal.pointB) ?? proposal.pointB
        };
        if (await this.isValidRoute(candidate)) {
          route = candidate;
          method = 'ai';
          price = price ?? boundedPrice(proposal.price);
        } else {
          logger.info('[Extractor] AI cities rejected by validation', candidate);
        }
      }
    }

    if (!route || !method) {
      logger.debug('[Extractor] No route found', { chatId: source.chatId, messageId: source.messageId });
      return null;
    }

    const [pointACoords, pointBCoords] = await Promise.all([
      this.geo.resolve(route.pointA),
      this.geo.resolve(route.pointB)
    ]);

    return {
      pointA: route.pointA,
      pointB: route.pointB,
      price,
      pointACoords,
      pointBCoords,
      text,
      sourceGroupId: source.chatId,
      sourceGroupTitle: source.chatTitle,
      sourceGroupUsername: source.chatUsername,
      sourceLink: buildSourceLink(source),
      messageId: source.messageId,
      author: source.author,
      region: this.dictionary.detectRegion(`${text} ${route.pointA} ${route.pointB}`),
      extractedBy: method
    };
  }

  private async isValidRoute(route: RoutePoints): Promise<boolean> {
    const [a, b] = await Promise.all([this.isValidCity(route.pointA), this.isValidCity(route.pointB)]);
    return a && b;
  }
}
