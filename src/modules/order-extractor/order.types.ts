/**
 * =============================================================================
 * ORDER EXTRACTOR - TYPES
 * =============================================================================
 */

import type { Coordinates } from '../../shared/utils/geospatial.utils';

export interface MessageAuthor {
  id?: string;
  username?: string;
  firstName?: string;
}

/**
 * Where a message came from, as seen by a monitoring account
 */
export interface MessageSource {
  /** Canonical (marked) chat id */
  chatId: string;
  chatTitle: string;
  chatUsername?: string;
  messageId: number;
  author: MessageAuthor;
}

export type ExtractionMethod = 'labeled' | 'preposition' | 'position' | 'dash' | 'ai';

export interface RoutePoints {
  pointA: string;
  pointB: string;
}

export interface LocationMatch extends RoutePoints {
  method: Exclude<ExtractionMethod, 'ai'>;
}

/**
 * A ride request extracted from one source message
 */
export interface ParsedOrder extends RoutePoints {
  /** Rubles, within PRICE_BOUNDS */
  price: number | null;
  pointACoords: Coordinates | null;
  pointBCoords: Coordinates | null;
  text: string;
  sourceGroupId: string;
  sourceGroupTitle: string;
  sourceGroupUsername?: string;
  /** Deep link to the original message; unique key for stored orders */
  sourceLink: string;
  messageId: number;
  author: MessageAuthor;
  region: string | null;
  extractedBy: ExtractionMethod;
}

export interface ExtractOptions {
  /** Escalate to the AI extractor when no pattern yields both cities */
  useAi?: boolean;
}
