/**
 * =============================================================================
 * MATCHING MODULE - DRIVER MATCHER
 * =============================================================================
 *
 * Which drivers should hear about an order.
 *
 * Candidates: subscribers of the source group (when filtering by group and
 * the group has at least one), otherwise every active driver with a location.
 * Each candidate must pass the radius and price-floor test; survivors are
 * sorted by distance to the pickup point (stable).
 *
 * Admin sweep: admins not already matched get the same test and are flagged
 * `adminExtra` when they are not subscribed to the source group, so admins
 * see all matching traffic.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import type { DriverRecord } from '../../shared/database/db';
import type { DriverRoster } from '../../shared/database/repository.interface';
import { Coordinates, isValidCoordinates } from '../../shared/utils/geospatial.utils';
import type { ParsedOrder } from '../order-extractor/order.types';

export interface DistanceCalculator {
  distanceKm(a: Coordinates, b: Coordinates): number;
  withinRadius(driver: Coordinates, order: Coordinates, radiusKm: number): boolean;
}

export type MatchableOrder = Pick<ParsedOrder, 'pointACoords' | 'price' | 'sourceGroupId'>;

export interface DriverMatch {
  driver: DriverRecord;
  distanceKm: number;
  /** Admin who sees this only through the admin sweep */
  adminExtra: boolean;
}

export interface DriverMatcherOptions {
  filterByGroup: boolean;
}

function driverCoordinates(driver: DriverRecord): Coordinates | null {
  if (driver.lat === undefined || driver.lon === undefined) return null;
  if (!isValidCoordinates(driver.lat, driver.lon)) return null;
  return { lat: driver.lat, lon: driver.lon };
}

/**
 * Price floor: no price never excludes, and minPrice 0 means no floor
 */
export function passesPriceFloor(price: number | null, minPrice: number): boolean {
  if (price === null || minPrice <= 0) return true;
  return price >= minPrice;
}

export class DriverMatcher {
  constructor(
    private readonly roster: DriverRoster,
    private readonly geo: DistanceCalculator,
    private readonly options: DriverMatcherOptions
  ) {}

  /**
   * Distance to the pickup point when the driver qualifies, otherwise null
   */
  evaluate(driver: DriverRecord, order: MatchableOrder): number | null {
    const origin = order.pointACoords;
    const position = driverCoordinates(driver);
    if (!origin || !position) return null;

    if (!this.geo.withinRadius(position, origin, driver.radiusKm)) return null;
    if (!passesPriceFloor(order.price, driver.minPrice)) return null;

    return this.geo.distanceKm(position, origin);
  }

  /**
   * Regular matches, nearest first
   */
  async findEligibleDrivers(order: MatchableOrder): Promise<DriverMatch[]> {
    if (!order.pointACoords) return [];

    let candidates: DriverRecord[] = [];
    if (this.options.filterByGroup) {
      candidates = await this.roster.listDriversSubscribedToGroup(order.sourceGroupId);
    }
    if (candidates.length === 0) {
      candidates = await this.roster.listActiveDrivers();
    }

    const matches: DriverMatch[] = [];
    for (const driver of candidates) {
      const distanceKm = this.evaluate(driver, order);
      if (distanceKm !== null) {
        matches.push({ driver, distanceKm, adminExtra: false });
      }
    }

    // Array.prototype.sort is stable
    matches.sort((a, b) => a.distanceKm - b.distanceKm);

    logger.debug('[Matcher] Eligible drivers', {
      groupId: order.sourceGroupId,
      candidates: candidates.length,
      matched: matches.length
    });
    return matches;
  }

  /**
   * Admins the regular pass did not reach
   */
  async findAdminExtras(order: MatchableOrder, alreadyMatched: ReadonlySet<string>): Promise<DriverMatch[]> {
    if (!order.pointACoords) return [];

    const extras: DriverMatch[] = [];
    for (const admin of await this.roster.listAdmins()) {
      if (alreadyMatched.has(admin.id)) continue;

      const distanceKm = this.evaluate(admin, order);
      if (distanceKm === null) continue;

      const subscribed = await this.roster.isSubscribedToGroup(admin.id, order.sourceGroupId);
      extras.push({ driver: admin, distanceKm, adminExtra: !subscribed });
    }

    extras.sort((a, b) => a.distanceKm - b.distanceKm);
    return extras;
  }
}
