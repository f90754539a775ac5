/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Unit Tests
 * =============================================================================
 *
 * Haversine distance, GPS parsing, rank mode and radius mode.
 * =============================================================================
 */

import {
  haversineDistanceKm,
  isValidCoordinates,
  parseDecimal,
  parseGpsPoint,
  parseRadiusKm,
  rankByDistance,
  roundDistanceKm,
  withinRadius
} from '../shared/utils/geospatial.utils';
import { Coordinates } from '../shared/types/api.types';

const MARKET_STREET: Coordinates = { latitude: 37.7749, longitude: -122.4194 };
const ONE_BLOCK_AWAY: Coordinates = { latitude: 37.7750, longitude: -122.4195 };
const NEW_JERSEY: Coordinates = { latitude: 40.0, longitude: -74.0 };

interface Spot {
  id: string;
  point: Coordinates;
}

const locate = (spot: Spot): Coordinates => spot.point;

describe('haversineDistanceKm', () => {
  it('should be zero for identical points', () => {
    expect(haversineDistanceKm(MARKET_STREET, MARKET_STREET)).toBe(0);
  });

  it('should be symmetric', () => {
    expect(haversineDistanceKm(MARKET_STREET, NEW_JERSEY))
      .toBeCloseTo(haversineDistanceKm(NEW_JERSEY, MARKET_STREET), 9);
  });

  it('should measure one degree of latitude as about 111.19 km', () => {
    expect(haversineDistanceKm({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })).toBeCloseTo(111.195, 3);
  });

  it('should measure neighbouring points in meters', () => {
    const distance = haversineDistanceKm(MARKET_STREET, ONE_BLOCK_AWAY);
    expect(distance).toBeCloseTo(0.0142, 4);
    expect(roundDistanceKm(distance)).toBe(0.01);
  });

  it('should measure cross-country distances', () => {
    expect(haversineDistanceKm(MARKET_STREET, NEW_JERSEY)).toBeCloseTo(4146.24, 1);
  });

  it('should stay finite for antipodal points and poles', () => {
    const halfCircumference = Math.PI * 6371;
    const antipode = { latitude: -37.7749, longitude: 57.5806 };

    expect(haversineDistanceKm(MARKET_STREET, antipode)).toBeCloseTo(halfCircumference, 2);
    expect(haversineDistanceKm({ latitude: 90, longitude: 0 }, { latitude: -90, longitude: 0 }))
      .toBeCloseTo(halfCircumference, 3);
    expect(haversineDistanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 180 }))
      .toBeCloseTo(halfCircumference, 3);
    expect(haversineDistanceKm({ latitude: 90, longitude: 0 }, { latitude: 90, longitude: 120 })).toBeCloseTo(0, 9);
  });
});

describe('roundDistanceKm', () => {
  it('should round to two decimals', () => {
    expect(roundDistanceKm(1.1119492664455182)).toBe(1.11);
    expect(roundDistanceKm(11.119492664455182)).toBe(11.12);
    expect(roundDistanceKm(0)).toBe(0);
  });
});

describe('GPS parameter parsing', () => {
  it('should parse decimals and reject blank or non-finite values', () => {
    expect(parseDecimal(' 37.5 ')).toBe(37.5);
    expect(parseDecimal('-122')).toBe(-122);
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('   ')).toBeNull();
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal(undefined)).toBeNull();
  });

  it('should read a point from gps_latitude and gps_longitude', () => {
    expect(parseGpsPoint({ gps_latitude: '37.7749', gps_longitude: '-122.4194' })).toEqual(MARKET_STREET);
  });

  it('should return null when either coordinate is missing, malformed or out of range', () => {
    expect(parseGpsPoint({ gps_latitude: '37.7749' })).toBeNull();
    expect(parseGpsPoint({ gps_latitude: 'north', gps_longitude: '-122.4194' })).toBeNull();
    expect(parseGpsPoint({ gps_latitude: '91', gps_longitude: '0' })).toBeNull();
    expect(parseGpsPoint({ gps_latitude: '0', gps_longitude: '-180.5' })).toBeNull();
  });

  it('should accept the coordinate bounds themselves', () => {
    expect(isValidCoordinates({ latitude: -90, longitude: 180 })).toBe(true);
    expect(isValidCoordinates({ latitude: Number.NaN, longitude: 0 })).toBe(false);
  });

  it('should fall back to the default radius when unparseable', () => {
    expect(parseRadiusKm('2.5', 10)).toBe(2.5);
    expect(parseRadiusKm(undefined, 10)).toBe(10);
    expect(parseRadiusKm('wide', 10)).toBe(10);
  });
});

describe('rank mode', () => {
  const spots: Spot[] = [
    { id: 'far', point: { latitude: 37.8749, longitude: -122.4194 } },
    { id: 'near', point: { latitude: 37.7849, longitude: -122.4194 } },
    { id: 'b-here', point: MARKET_STREET },
    { id: 'a-here', point: MARKET_STREET }
  ];

  it('should order rows by non-decreasing distance, ties by id', () => {
    const ranked = rankByDistance(spots, MARKET_STREET, locate);

    expect(ranked.map(entry => entry.row.id)).toEqual(['a-here', 'b-here', 'near', 'far']);
    for (let i = 1; i < ranked.length; i++) {
      expect(ranked[i].distanceKm).toBeGreaterThanOrEqual(ranked[i - 1].distanceKm);
    }
  });

  it('should annotate each row with its full-precision distance', () => {
    const ranked = rankByDistance(spots, MARKET_STREET, locate);
    expect(ranked[2].distanceKm).toBeCloseTo(1.11195, 4);
  });
});

describe('radius mode', () => {
  const spots: Spot[] = [
    { id: 'one-block', point: ONE_BLOCK_AWAY },
    { id: 'new-jersey', point: NEW_JERSEY },
    { id: 'one-km-north', point: { latitude: 37.7849, longitude: -122.4194 } }
  ];

  it('should include a point 0.01 km away and exclude one 4146 km away at radius 1', () => {
    const inRange = withinRadius(spots, MARKET_STREET, 1, locate);
    expect(inRange.map(entry => entry.row.id)).toEqual(['one-block']);
  });

  it('should only return rows within the radius, nearest first', () => {
    const inRange = withinRadius(spots, MARKET_STREET, 2, locate);

    expect(inRange.map(entry => entry.row.id)).toEqual(['one-block', 'one-km-north']);
    inRange.forEach(entry => expect(entry.distanceKm).toBeLessThanOrEqual(2));
  });

  it('should return nothing for a negative radius', () => {
    expect(withinRadius(spots, MARKET_STREET, -1, locate)).toEqual([]);
  });
});
