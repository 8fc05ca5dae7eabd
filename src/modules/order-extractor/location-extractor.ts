/**
 * =============================================================================
 * ORDER EXTRACTOR - LOCATION STRATEGIES
 * =============================================================================
 *
 * Origin/destination extraction, tried in fixed order, first success wins:
 *
 *   1. labeled       "А: Уфа Б: Казань", "🚩 Уфа / 🏁 Казань", "Откуда: ... Куда: ..."
 *   2. preposition   "из Уфы в Казань", "от Перми до Кургана"
 *   3. position      first two dictionary cities anywhere in the text
 *   4. dash          "Екб - Челябинск", "Уфа → Казань" with fuzzy fallback
 *
 * Every result is normalized through aliases and declensions.
 * =============================================================================
 */

import { CITY_NAME_MIN_LENGTH } from '../../core/constants';
import { CityDictionary, LETTERS } from './city-dictionary';
import type { LocationMatch } from './order.types';

const CYR = 'А-Яа-яЁё';
const NOT_AFTER_LETTER = `(?<![${LETTERS}])`;
const SEPARATOR = '\\s*[:.-]';

// "🚩 Уфа", "🚩 А: Уфа", "А: Уфа", "Точка А - Уфа", "Откуда: Уфа"
export const LABEL_A = new RegExp(
  `(?:🚩\\s*(?:(?:точка\\s+)?[AАaа](?![${LETTERS}])(?:${SEPARATOR})?)?` +
  `|${NOT_AFTER_LETTER}(?:откуда|(?:точка\\s+)?[AАaа])${SEPARATOR})\\s*`,
  'i'
);

export const LABEL_B = new RegExp(
  `(?:🏁\\s*(?:(?:точка\\s+)?[BБбb](?![${LETTERS}])(?:${SEPARATOR})?)?` +
  `|${NOT_AFTER_LETTER}(?:куда|(?:точка\\s+)?[BБбb])${SEPARATOR})\\s*`,
  'i'
);

const PLACE = `[${CYR}][${CYR}-]*(?:\\s+[${CYR}][${CYR}-]*)?`;

const PREPOSITION_RE = new RegExp(
  `${NOT_AFTER_LETTER}(?:из|от|с)\\s+(${PLACE})\\s+(?:в|до|на|к)\\s+(${PLACE})`,
  'gi'
);

const DASH_RE = new RegExp(
  `(${PLACE})\\s*[-–—→>]+\\s*(${PLACE})`,
  'g'
);

function firstSegment(fragment: string): string {
  return fragment.split(/[\n/]/)[0].trim().replace(/[,;.!]+$/, '');
}

function firstWord(fragment: string): string {
  return (fragment.trim().split(/\s+/)[0] ?? '').replace(new RegExp(`[^${LETTERS}-]`, 'g'), '');
}

function normalize(dictionary: CityDictionary, name: string): string {
  return dictionary.canonicalize(name) ?? name;
}

function result(
  dictionary: CityDictionary,
  pointA: string,
  pointB: string,
  method: LocationMatch['method']
): LocationMatch {
  return {
    pointA: normalize(dictionary, pointA),
    pointB: normalize(dictionary, pointB),
    method
  };
}

// =============================================================================
// STRATEGIES
// =============================================================================

function resolveLabeledSegment(dictionary: CityDictionary, segment: string): string | undefined {
  const found = dictionary.findInFragment(segment);
  if (found) return found;

  const word = firstWord(segment);
  if (word.length < CITY_NAME_MIN_LENGTH) return undefined;
  return dictionary.fuzzyMatch(word) ?? word;
}

export function extractLabeled(text: string, dictionary: CityDictionary): LocationMatch | null {
  const labelA = LABEL_A.exec(text);
  if (!labelA) return null;

  const rest = text.slice(labelA.index + labelA[0].length);
  const labelB = LABEL_B.exec(rest);
  if (!labelB) return null;

  const pointA = resolveLabeledSegment(dictionary, firstSegment(rest.slice(0, labelB.index)));
  const pointB = resolveLabeledSegment(dictionary, firstSegment(rest.slice(labelB.index + labelB[0].length)));
  if (!pointA || !pointB) return null;

  return result(dictionary, pointA, pointB, 'labeled');
}

function resolveStrict(dictionary: CityDictionary, fragment: string): string | undefined {
  return dictionary.canonicalize(fragment)
    ?? dictionary.findInFragment(fragment)
    ?? dictionary.fuzzyMatch(firstWord(fragment));
}

export function extractPreposition(text: string, dictionary: CityDictionary): LocationMatch | null {
  for (const match of text.matchAll(PREPOSITION_RE)) {
    const pointA = resolveStrict(dictionary, match[1]);
    const pointB = resolveStrict(dictionary, match[2]);
    if (pointA && pointB) {
      return result(dictionary, pointA, pointB, 'preposition');
    }
  }
  return null;
}

export function extractByPosition(text: string, dictionary: CityDictionary): LocationMatch | null {
  const seen: string[] = [];
  for (const hit of dictionary.findAll(text)) {
    if (!seen.includes(hit.canonical)) {
      seen.push(hit.canonical);
    }
    if (seen.length === 2) {
      return result(dictionary, seen[0], seen[1], 'position');
    }
  }
  return null;
}

function resolveDashSide(dictionary: CityDictionary, raw: string): string | undefined {
  const value = raw.trim();
  const found = dictionary.findInFragment(value) ?? dictionary.fuzzyMatch(value);
  if (found) return found;

  if (value.length < CITY_NAME_MIN_LENGTH || dictionary.isStreetLike(value) || dictionary.isStopword(value)) {
    return undefined;
  }
  return value;
}

export function extractDash(text: string, dictionary: CityDictionary): LocationMatch | null {
  for (const match of text.matchAll(DASH_RE)) {
    const pointA = resolveDashSide(dictionary, match[1]);
    const pointB = resolveDashSide(dictionary, match[2]);
    if (pointA && pointB) {
      return result(dictionary, pointA, pointB, 'dash');
    }
  }
  return null;
}

const STRATEGIES = [extractLabeled, extractPreposition, extractByPosition, extractDash];

/**
 * Origin and destination from free text, or null when no strategy finds both
 */
export function extractLocations(text: string, dictionary: CityDictionary): LocationMatch | null {
  for (const strategy of STRATEGIES) {
    const match = strategy(text, dictionary);
    if (match) return match;
  }
  return null;
}
