/**
 * =============================================================================
 * DRIVER MATCHER - Tests
 * =============================================================================
 */

import { DistanceCalculator, DriverMatcher, MatchableOrder, passesPriceFloor } from '../modules/matching/driver-matcher.service';
import { GeoService } from '../modules/geo/geo.service';
import { DatabaseService, DriverInput } from '../shared/database/db';
import { Coordinates, offsetNorthKm } from '../shared/utils/geospatial.utils';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const UFA: Coordinates = { lat: 54.7431, lon: 55.9678 };
const GROUP = '-1001700000001';

const geo = new GeoService({ geocoder: null, knownCoordinates: {} });

function order(overrides: Partial<MatchableOrder> = {}): MatchableOrder {
  return { pointACoords: UFA, price: 3000, sourceGroupId: GROUP, ...overrides };
}

function driverAt(telegramId: number, km: number, extra: Partial<DriverInput> = {}): DriverInput {
  const position = offsetNorthKm(UFA, km);
  return { telegramId, lat: position.lat, lon: position.lon, radiusKm: 50, ...extra };
}

describe('passesPriceFloor', () => {
  it('should never exclude an order without a price', () => {
    expect(passesPriceFloor(null, 1000)).toBe(true);
  });

  it('should treat a zero floor as no floor', () => {
    expect(passesPriceFloor(1, 0)).toBe(true);
  });

  it('should compare inclusively', () => {
    expect(passesPriceFloor(999, 1000)).toBe(false);
    expect(passesPriceFloor(1000, 1000)).toBe(true);
  });
});

describe('DriverMatcher', () => {
  let store: DatabaseService;

  beforeEach(() => {
    store = new DatabaseService(null);
  });

  describe('findEligibleDrivers', () => {
    it('should leave the radius decision to the geo service', async () => {
      const driver = await store.upsertDriver(driverAt(1, 10));
      const strict: DistanceCalculator = {
        distanceKm: (a, b) => geo.distanceKm(a, b),
        withinRadius: jest.fn(() => false)
      };
      const matcher = new DriverMatcher(store, strict, { filterByGroup: false });

      await expect(matcher.findEligibleDrivers(order())).resolves.toEqual([]);
      expect(strict.withinRadius).toHaveBeenCalledWith({ lat: driver.lat, lon: driver.lon }, UFA, 50);
    });

    it('should keep drivers within their radius, nearest first', async () => {
      const far = await store.upsertDriver(driverAt(1, 60));
      const mid = await store.upsertDriver(driverAt(2, 30));
      const near = await store.upsertDriver(driverAt(3, 10));
      const matcher = new DriverMatcher(store, geo, { filterByGroup: false });

      const matches = await matcher.findEligibleDrivers(order());

      expect(matches.map(m => m.driver.id)).toEqual([near.id, mid.id]);
      expect(matches.map(m => m.driver.id)).not.toContain(far.id);
      expect(matches[0].distanceKm).toBeCloseTo(10, 6);
      expect(matches.every(m => !m.adminExtra)).toBe(true);
    });

    it('should apply each driver\'s price floor', async () => {
      const strict = await store.upsertDriver(driverAt(1, 5, { minPrice: 5000 }));
      const relaxed = await store.upsertDriver(driverAt(2, 5, { minPrice: 0 }));
      const matcher = new DriverMatcher(store, geo, { filterByGroup: false });

      expect((await matcher.findEligibleDrivers(order({ price: 3000 }))).map(m => m.driver.id)).toEqual([relaxed.id]);
      expect((await matcher.findEligibleDrivers(order({ price: null }))).map(m => m.driver.id))
        .toEqual([strict.id, relaxed.id]);
    });

    it('should keep insertion order for equal distances', async () => {
      const first = await store.upsertDriver(driverAt(1, 20));
      const second = await store.upsertDriver(driverAt(2, 20));
      const matcher = new DriverMatcher(store, geo, { filterByGroup: false });

      const matches = await matcher.findEligibleDrivers(order());
      expect(matches.map(m => m.driver.id)).toEqual([first.id, second.id]);
    });

    it('should only consider group subscribers when filtering by group', async () => {
      const subscriber = await store.upsertDriver(driverAt(1, 20));
      await store.upsertDriver(driverAt(2, 5));
      await store.addGroupSubscription({ driverId: subscriber.id, groupId: GROUP, title: 'Межгород' });
      const matcher = new DriverMatcher(store, geo, { filterByGroup: true });

      const matches = await matcher.findEligibleDrivers(order());
      expect(matches.map(m => m.driver.id)).toEqual([subscriber.id]);
    });

    it('should fall back to every active driver when the group has no subscribers', async () => {
      const driver = await store.upsertDriver(driverAt(1, 20));
      const matcher = new DriverMatcher(store, geo, { filterByGroup: true });

      const matches = await matcher.findEligibleDrivers(order());
      expect(matches.map(m => m.driver.id)).toEqual([driver.id]);
    });

    it('should skip inactive drivers and drivers without a usable location', async () => {
      await store.upsertDriver(driverAt(1, 5, { active: false }));
      await store.upsertDriver({ telegramId: 2 });
      await store.upsertDriver({ telegramId: 3, lat: 123, lon: 55.9678 });
      const matcher = new DriverMatcher(store, geo, { filterByGroup: false });

      await expect(matcher.findEligibleDrivers(order())).resolves.toEqual([]);
    });

    it('should match nobody when the order has no origin coordinates', async () => {
      await store.upsertDriver(driverAt(1, 5));
      const matcher = new DriverMatcher(store, geo, { filterByGroup: false });

      await expect(matcher.findEligibleDrivers(order({ pointACoords: null }))).resolves.toEqual([]);
    });
  });

  describe('findAdminExtras', () => {
    it('should flag in-range admins outside the source group', async () => {
      const subscriber = await store.upsertDriver(driverAt(1, 20));
      const admin = await store.upsertDriver(driverAt(2, 10, { isAdmin: true }));
      await store.upsertDriver(driverAt(3, 80, { isAdmin: true }));
      await store.addGroupSubscription({ driverId: subscriber.id, groupId: GROUP, title: 'Межгород' });
      const matcher = new DriverMatcher(store, geo, { filterByGroup: true });

      const matches = await matcher.findEligibleDrivers(order());
      const extras = await matcher.findAdminExtras(order(), new Set(matches.map(m => m.driver.id)));

      expect(extras).toHaveLength(1);
      expect(extras[0].driver.id).toBe(admin.id);
      expect(extras[0].adminExtra).toBe(true);
    });

    it('should skip admins already matched', async () => {
      const admin = await store.upsertDriver(driverAt(1, 10, { isAdmin: true }));
      const matcher = new DriverMatcher(store, geo, { filterByGroup: false });

      await expect(matcher.findAdminExtras(order(), new Set([admin.id]))).resolves.toEqual([]);
    });

    it('should not flag a subscribed admin', async () => {
      const admin = await store.upsertDriver(driverAt(1, 10, { isAdmin: true }));
      await store.addGroupSubscription({ driverId: admin.id, groupId: GROUP, title: 'Межгород' });
      const matcher = new DriverMatcher(store, geo, { filterByGroup: true });

      const extras = await matcher.findAdminExtras(order(), new Set<string>());
      expect(extras.map(e => [e.driver.id, e.adminExtra])).toEqual([[admin.id, false]]);
    });
  });
});
