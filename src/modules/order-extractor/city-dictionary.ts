/**
 * =============================================================================
 * ORDER EXTRACTOR - CITY DICTIONARY
 * =============================================================================
 *
 * Known cities, aliases ("екб", "спб") and declined forms ("из Уфы") all
 * resolve to one canonical city name. Also owns the word lists the gate and
 * validation use: stopwords, order keywords, closed markers, street words
 * and regions.
 * =============================================================================
 */

import cityData from '../../data/cities.json';
import { FUZZY_MATCH_THRESHOLD } from '../../core/constants';
import { cityDictionarySchema, CityDictionaryData } from './order.schema';

export const LETTERS = 'A-Za-zА-Яа-яЁё';

const LETTER_RE = new RegExp(`[${LETTERS}]`);

export interface CityHit {
  canonical: string;
  start: number;
  end: number;
}

interface Term {
  term: string;
  canonical: string;
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && LETTER_RE.test(ch);
}

function normalizeForFuzzy(value: string): string {
  return value.toLowerCase().replace(/ё/g, 'е').replace(/й/g, 'и').trim();
}

/**
 * Levenshtein distance, two-row variant
 */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // substitution
        current[j - 1] + 1,     // insertion
        previous[j] + 1         // deletion
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * 1.0 for identical strings, 0.0 for nothing in common
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a, b) / longest;
}

export class CityDictionary {
  private readonly lookup = new Map<string, string>();
  /** Longest term first, so "нижний тагил" wins over "тагил" */
  private readonly terms: Term[];
  private readonly fuzzyCandidates: Array<{ normalized: string; canonical: string }>;
  private readonly stopwords: Set<string>;
  private readonly streetWords: Set<string>;
  private readonly orderKeywords: string[];
  private readonly closedMarkers: string[];
  private readonly regions: Array<{ name: string; places: string[] }>;

  constructor(data: CityDictionaryData) {
    for (const city of data.knownCities) {
      this.lookup.set(city.toLowerCase(), city);
    }
    for (const [alias, city] of Object.entries(data.aliases)) {
      this.lookup.set(alias.toLowerCase(), city);
    }
    for (const [form, city] of Object.entries(data.declensions)) {
      this.lookup.set(form.toLowerCase(), city);
    }

    this.terms = Array.from(this.lookup, ([term, canonical]) => ({ term, canonical }))
      .sort((a, b) => b.term.length - a.term.length);
    this.fuzzyCandidates = data.knownCities.map(city => ({ normalized: normalizeForFuzzy(city), canonical: city }));
    this.stopwords = new Set(data.stopwords.map(w => w.toLowerCase()));
    this.streetWords = new Set(data.streetWords.map(w => w.toLowerCase()));
    this.orderKeywords = data.orderKeywords.map(w => w.toLowerCase());
    this.closedMarkers = data.closedMarkers.map(w => w.toLowerCase());
    this.regions = data.regions.map(r => ({ name: r.name, places: r.places.map(p => p.toLowerCase()) }));
  }

  /**
   * Canonical city for an exact name, alias or declined form
   */
  canonicalize(name: string): string | undefined {
    return this.lookup.get(name.trim().toLowerCase());
  }

  isKnown(name: string): boolean {
    return this.canonicalize(name) !== undefined;
  }

  isStopword(name: string): boolean {
    return this.stopwords.has(name.trim().toLowerCase());
  }

  /**
   * Leading digit, or a street-type word ("ул. Ленина", "пр Мира")
   */
  isStreetLike(token: string): boolean {
    const value = token.trim().toLowerCase();
    if (/^\d/.test(value)) return true;
    const match = /^([а-яё]+)[.\s]/.exec(value);
    return match !== null && this.streetWords.has(match[1]);
  }

  /**
   * Closest known city by edit similarity, at or above the threshold
   */
  fuzzyMatch(word: string, threshold: number = FUZZY_MATCH_THRESHOLD): string | undefined {
    const normalized = normalizeForFuzzy(word);
    if (normalized.length < 3) return undefined;

    let best: { canonical: string; score: number } | undefined;
    for (const candidate of this.fuzzyCandidates) {
      const score = similarity(normalized, candidate.normalized);
      if (score >= threshold && (!best || score > best.score)) {
        best = { canonical: candidate.canonical, score };
      }
    }
    return best?.canonical;
  }

  /**
   * Every whole-word dictionary hit, left to right, without overlaps.
   * Longer terms claim their span first.
   */
  findAll(text: string): CityHit[] {
    const lower = text.toLowerCase();
    const hits: CityHit[] = [];

    for (const { term, canonical } of this.terms) {
      let from = 0;
      for (;;) {
        const start = lower.indexOf(term, from);
        if (start === -1) break;
        const end = start + term.length;
        from = start + 1;

        if (isLetter(lower[start - 1]) || isLetter(lower[end])) continue;
        if (hits.some(h => start < h.end && end > h.start)) continue;
        hits.push({ canonical, start, end });
      }
    }

    return hits.sort((a, b) => a.start - b.start);
  }

  /**
   * First city mentioned in a fragment
   */
  findInFragment(fragment: string): string | undefined {
    return this.findAll(fragment)[0]?.canonical;
  }

  hasOrderKeyword(text: string): boolean {
    const lower = text.toLowerCase();
    return this.orderKeywords.some(k => lower.includes(k));
  }

  hasClosedMarker(text: string): boolean {
    const lower = text.toLowerCase();
    return this.closedMarkers.some(m => lower.includes(m));
  }

  /**
   * First configured region with a place mentioned in the haystack
   */
  detectRegion(haystack: string): string | null {
    const lower = haystack.toLowerCase();
    const region = this.regions.find(r => r.places.some(p => lower.includes(p)));
    return region ? region.name : null;
  }
}

let defaultDictionary: CityDictionary | null = null;

/**
 * Dictionary built from src/data/cities.json
 */
export function getCityDictionary(): CityDictionary {
  if (!defaultDictionary) {
    defaultDictionary = new CityDictionary(cityDictionarySchema.parse(cityData));
  }
  return defaultDictionary;
}
