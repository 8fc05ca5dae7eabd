/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, no I/O. Single source of truth for distance math used by
 * the geo service and the driver matcher.
 * =============================================================================
 */

/**
 * Earth's radius constants
 */
export const EARTH_RADIUS = {
  KM: 6371,
};

export interface Coordinates {
  lat: number;
  lon: number;
}

/**
 * Great-circle distance between two points using the Haversine formula
 *
 * @returns Distance in kilometers
 */
export function haversineDistanceKm(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS.KM * c;
}

/**
 * Point shifted north by the given distance (same longitude).
 * Used for building driver positions a known distance away.
 */
export function offsetNorthKm(origin: Coordinates, km: number): Coordinates {
  const degreesPerKm = 180 / (Math.PI * EARTH_RADIUS.KM);
  return { lat: origin.lat + km * degreesPerKm, lon: origin.lon };
}

export function isValidCoordinates(lat: number, lon: number): boolean {
  return Number.isFinite(lat) && Number.isFinite(lon) &&
    lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
}

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}
