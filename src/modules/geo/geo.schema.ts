/**
 * =============================================================================
 * GEO MODULE - SCHEMA
 * =============================================================================
 *
 * Zod schemas for geocoder responses, cached values and the curated
 * coordinates file.
 * =============================================================================
 */

import { z } from 'zod';

export const coordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180)
});

/**
 * Cached geocode outcome: coordinates, or null for a remembered miss
 */
export const cachedCoordinatesSchema = coordinatesSchema.nullable();

export const knownCoordinatesSchema = z.record(z.string(), coordinatesSchema);

/**
 * Nominatim /search returns lat/lon as strings
 */
export const nominatimSearchSchema = z.array(z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string().optional()
}));

export const nominatimReverseSchema = z.object({
  address: z.object({
    city: z.string().optional(),
    town: z.string().optional(),
    village: z.string().optional(),
    municipality: z.string().optional(),
    state: z.string().optional()
  }).optional()
});
