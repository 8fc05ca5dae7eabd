/**
 * =============================================================================
 * ORDER EXTRACTOR - PRICE
 * =============================================================================
 *
 * Rules, first match wins (no aggregation across rules):
 *   1. comma thousands      "3,500 руб"
 *   2. amount + currency    "3500 руб", "3500₽", "3500р"
 *   3. shorthand thousands  "15к", "15 тыс"
 *   4. bare 4-5 digit number
 *
 * Dates, times and phone numbers are removed first so "12.05.2024" or
 * "+7 912 345-67-89" never read as prices. Every candidate must fall within
 * PRICE_BOUNDS.
 * =============================================================================
 */

import { PRICE_BOUNDS } from '../../core/constants';

const DATE_RE = /\d{1,2}[./]\d{1,2}[./]\d{2,4}/g;
const TIME_RE = /\d{1,2}\s*:\s*\d{2}/g;
const PHONE_RE = /(?:\+7|8)[\s(-]*\d{3}[\s)-]*\d{3}[\s-]*\d{2}[\s-]*\d{2}/g;

type PriceRule = (text: string) => number | null;

function inBounds(value: number): boolean {
  return Number.isFinite(value) && value >= PRICE_BOUNDS.MIN && value <= PRICE_BOUNDS.MAX;
}

function firstInBounds(text: string, pattern: RegExp, toValue: (match: RegExpMatchArray) => number): number | null {
  for (const match of text.matchAll(pattern)) {
    const value = toValue(match);
    if (inBounds(value)) return value;
  }
  return null;
}

const commaThousands: PriceRule = text =>
  firstInBounds(text, /(?<!\d)(\d{1,3}),(\d{3})(?!\d)/g, m => parseInt(m[1] + m[2], 10));

const withCurrency: PriceRule = text =>
  firstInBounds(text, /(?<!\d)(\d{3,5})\s*(?:руб|₽|р\.?(?![а-яё]))/gi, m => parseInt(m[1], 10));

const shorthandThousands: PriceRule = text =>
  firstInBounds(
    text,
    /(?<!\d)(\d{1,3})(?:\s*тыс\.?|к|т)(?![а-яёa-z\d])/gi,
    m => parseInt(m[1], 10) * 1000
  );

const bareNumber: PriceRule = text =>
  firstInBounds(text, /(?:^|\s)(\d{4,5})(?=\s|$|[,.!;])/g, m => parseInt(m[1], 10));

const RULES: PriceRule[] = [commaThousands, withCurrency, shorthandThousands, bareNumber];

export function stripNonPriceNumbers(text: string): string {
  return text
    .replace(DATE_RE, ' ')
    .replace(TIME_RE, ' ')
    .replace(PHONE_RE, ' ');
}

/**
 * Price in rubles, or null when nothing plausible is found
 */
export function extractPrice(text: string): number | null {
  const cleaned = stripNonPriceNumbers(text);
  for (const rule of RULES) {
    const price = rule(cleaned);
    if (price !== null) return price;
  }
  return null;
}
