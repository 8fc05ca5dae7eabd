/**
 * =============================================================================
 * GEO MODULE - SERVICE
 * =============================================================================
 *
 * Place name → coordinates, coordinates → place name, and distance checks.
 *
 * Resolution order for `resolve(name)`:
 *   1. cache (hits and remembered misses)
 *   2. curated coordinates (resorts, rural points, abbreviations)
 *   3. external geocoder, behind a circuit breaker
 *
 * Every definitive outcome is cached, misses included. Transport failures
 * return null without caching so the name is tried again later.
 * Concurrent lookups of the same uncached name share one request.
 * =============================================================================
 */

import knownCoordinatesData from '../../data/known-coordinates.json';
import { logger } from '../../shared/services/logger.service';
import { CacheService } from '../../shared/services/cache.service';
import { CircuitBreaker, circuitBreakerRegistry } from '../../shared/resilience/circuit-breaker';
import { Coordinates, haversineDistanceKm } from '../../shared/utils/geospatial.utils';
import { errorMessage } from '../../core/errors/AppError';
import { GEOCODER } from '../../core/constants';
import { cachedCoordinatesSchema, knownCoordinatesSchema } from './geo.schema';
import type { GeocoderClient } from './nominatim.client';

export interface GeoServiceOptions {
  /** null disables external lookups entirely */
  geocoder: GeocoderClient | null;
  cache?: CacheService;
  knownCoordinates?: Record<string, Coordinates>;
  breaker?: CircuitBreaker;
}

const DEFAULT_KNOWN_COORDINATES: Record<string, Coordinates> = knownCoordinatesSchema.parse(knownCoordinatesData);

function cacheKey(name: string): string {
  return name.trim().toLowerCase();
}

export class GeoService {
  private readonly geocoder: GeocoderClient | null;
  private readonly cache: CacheService;
  private readonly known: Map<string, Coordinates>;
  private readonly breaker: CircuitBreaker;
  private readonly inFlight = new Map<string, Promise<Coordinates | null>>();

  constructor(options: GeoServiceOptions) {
    this.geocoder = options.geocoder;
    this.cache = options.cache ?? new CacheService('geocode');
    this.known = new Map(
      Object.entries(options.knownCoordinates ?? DEFAULT_KNOWN_COORDINATES)
        .map(([name, coords]) => [cacheKey(name), coords])
    );
    this.breaker = options.breaker ?? new CircuitBreaker({
      name: 'geocoder',
      failureThreshold: GEOCODER.CIRCUIT_FAILURE_THRESHOLD,
      resetTimeout: GEOCODER.CIRCUIT_RESET_TIMEOUT_MS,
      requestTimeout: GEOCODER.REQUEST_TIMEOUT_MS
    });
    circuitBreakerRegistry.register(this.breaker);
  }

  /**
   * Coordinates for a place name, or null when it cannot be located
   */
  async resolve(name: string): Promise<Coordinates | null> {
    const key = cacheKey(name);
    if (key === '') return null;

    const cached = cachedCoordinatesSchema.safeParse(await this.cache.getJSON(key));
    if (cached.success) {
      return cached.data;
    }

    const known = this.known.get(key);
    if (known) {
      await this.cache.setJSON(key, known);
      return known;
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const lookup = this.lookupExternal(key).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, lookup);
    return lookup;
  }

  private async lookupExternal(key: string): Promise<Coordinates | null> {
    const geocoder = this.geocoder;
    if (!geocoder) return null;

    try {
      const coords = await this.breaker.execute(() => geocoder.search(key));
      await this.cache.setJSON(key, coords);
      if (!coords) {
        logger.debug('[Geo] Place not found', { name: key });
      }
      return coords;
    } catch (error) {
      logger.warn('[Geo] Geocoding failed, treating as unresolved', { name: key, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Administrative place name for a point (used to label a driver's location)
   */
  async reverseResolve(lat: number, lon: number): Promise<string | null> {
    const geocoder = this.geocoder;
    if (!geocoder) return null;

    try {
      return await this.breaker.execute(() => geocoder.reverse(lat, lon));
    } catch (error) {
      logger.warn('[Geo] Reverse geocoding failed', { lat, lon, error: errorMessage(error) });
      return null;
    }
  }

  distanceKm(a: Coordinates, b: Coordinates): number {
    return haversineDistanceKm(a.lat, a.lon, b.lat, b.lon);
  }

  /**
   * Inclusive: a point exactly radiusKm away is within the radius
   */
  withinRadius(driver: Coordinates, order: Coordinates, radiusKm: number): boolean {
    return this.distanceKm(driver, order) <= radiusKm;
  }
}
