/**
 * =============================================================================
 * GEO MODULE - NOMINATIM CLIENT
 * =============================================================================
 *
 * Forward and reverse geocoding against a Nominatim-compatible endpoint.
 * Forward lookups are constrained to one country. Failures surface as
 * ExternalServiceError; a well-formed "nothing found" is a plain null.
 * =============================================================================
 */

import { config } from '../../config/environment';
import { ExternalServiceError, errorMessage } from '../../core/errors/AppError';
import { ErrorCode } from '../../core/constants';
import type { Coordinates } from '../../shared/utils/geospatial.utils';
import { nominatimReverseSchema, nominatimSearchSchema } from './geo.schema';

export type FetchFn = typeof fetch;

export interface GeocoderClient {
  search(name: string): Promise<Coordinates | null>;
  reverse(lat: number, lon: number): Promise<string | null>;
}

export interface NominatimOptions {
  baseUrl: string;
  userAgent: string;
  country: string;
  countryCode: string;
  fetchFn?: FetchFn;
}

export class NominatimClient implements GeocoderClient {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: NominatimOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async search(name: string): Promise<Coordinates | null> {
    const params = new URLSearchParams({
      q: `${name}, ${this.options.country}`,
      format: 'json',
      limit: '1',
      countrycodes: this.options.countryCode,
      'accept-language': 'ru'
    });

    const body = await this.request(`/search?${params.toString()}`);
    const parsed = nominatimSearchSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError('geocoder', 'Unexpected search response shape', false, ErrorCode.GEOCODER_UNAVAILABLE);
    }

    const first = parsed.data[0];
    return first ? { lat: first.lat, lon: first.lon } : null;
  }

  async reverse(lat: number, lon: number): Promise<string | null> {
    const params = new URLSearchParams({
      lat: String(lat),
      lon: String(lon),
      format: 'json',
      zoom: '10',
      'accept-language': 'ru'
    });

    const body = await this.request(`/reverse?${params.toString()}`);
    const parsed = nominatimReverseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError('geocoder', 'Unexpected reverse response shape', false, ErrorCode.GEOCODER_UNAVAILABLE);
    }

    const address = parsed.data.address;
    if (!address) return null;
    return address.city ?? address.town ?? address.village ?? address.municipality ?? address.state ?? null;
  }

  private async request(pathAndQuery: string): Promise<unknown> {
    let response: Awaited<ReturnType<FetchFn>>;
    try {
      response = await this.fetchFn(`${this.options.baseUrl}${pathAndQuery}`, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' }
      });
    } catch (error) {
      throw new ExternalServiceError(
        'geocoder',
        `Geocoder request failed: ${errorMessage(error)}`,
        true,
        ErrorCode.GEOCODER_UNAVAILABLE
      );
    }

    if (!response.ok) {
      throw new ExternalServiceError(
        'geocoder',
        `Geocoder responded with HTTP ${response.status}`,
        response.status >= 500 || response.status === 429,
        ErrorCode.GEOCODER_UNAVAILABLE,
        { status: response.status }
      );
    }

    return response.json();
  }
}

export function createNominatimClient(fetchFn?: FetchFn): NominatimClient {
  return new NominatimClient({
    baseUrl: config.geocoder.baseUrl,
    userAgent: config.geocoder.userAgent,
    country: config.geocoder.country,
    countryCode: config.geocoder.countryCode,
    fetchFn
  });
}
