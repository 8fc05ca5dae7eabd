/**
 * =============================================================================
 * ORDER EXTRACTOR - SCHEMA
 * =============================================================================
 *
 * Zod schemas for the city dictionary file and for the AI extraction
 * service's responses.
 * =============================================================================
 */

import { z } from 'zod';

export const cityDictionarySchema = z.object({
  knownCities: z.array(z.string().min(1)),
  aliases: z.record(z.string(), z.string()),
  declensions: z.record(z.string(), z.string()),
  stopwords: z.array(z.string()),
  orderKeywords: z.array(z.string()),
  closedMarkers: z.array(z.string()),
  streetWords: z.array(z.string()),
  regions: z.array(z.object({
    name: z.string(),
    places: z.array(z.string())
  }))
});

export type CityDictionaryData = z.infer<typeof cityDictionarySchema>;

/**
 * OpenAI-compatible chat completion envelope
 */
export const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable()
    })
  })).min(1)
});

const nullableText = z.string().trim().nullable().optional()
  .transform(value => (value ? value : null));

/**
 * Payload the extraction prompt asks for.
 * Price may come back as a number, a numeric string or null.
 */
export const aiExtractionSchema = z.object({
  point_a: nullableText,
  point_b: nullableText,
  price: z.union([z.number(), z.string(), z.null()]).optional()
    .transform(value => {
      if (value === null || value === undefined) return null;
      const parsed = typeof value === 'number' ? value : parseInt(value.replace(/\D/g, ''), 10);
      return Number.isFinite(parsed) ? Math.round(parsed) : null;
    })
});

export type AiExtractionPayload = z.infer<typeof aiExtractionSchema>;
