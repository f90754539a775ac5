/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance, Rank & Radius Search
 * =============================================================================
 *
 * Pure functions, no I/O. Distances are computed in application code over
 * rows already fetched from the store; no query text is built from input.
 *
 * Sorting and radius comparison use full precision. Only values surfaced to
 * callers go through roundDistanceKm().
 * =============================================================================
 */

import { Coordinates, QueryParams } from '../types/api.types';
import { COORDINATE_BOUNDS, DISTANCE_DECIMALS } from '../../core/constants';

/**
 * Earth's mean radius
 */
export const EARTH_RADIUS = {
  KM: 6371,
  METERS: 6371000,
};

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Great-circle distance between two points, in kilometers.
 *
 * `a` is clamped to [0, 1]: for antipodal points floating rounding can push
 * it just above 1, which would make asin(√a) NaN.
 */
export function haversineDistanceKm(from: Coordinates, to: Coordinates): number {
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const dLat = toRadians(to.latitude - from.latitude);
  const dLng = toRadians(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;

  const clamped = Math.min(1, Math.max(0, a));

  return 2 * EARTH_RADIUS.KM * Math.asin(Math.sqrt(clamped));
}

export function roundDistanceKm(distanceKm: number): number {
  const factor = 10 ** DISTANCE_DECIMALS;
  return Math.round(distanceKm * factor) / factor;
}

export function isValidCoordinates(point: Coordinates): boolean {
  return (
    Number.isFinite(point.latitude) &&
    Number.isFinite(point.longitude) &&
    point.latitude >= COORDINATE_BOUNDS.LATITUDE.MIN &&
    point.latitude <= COORDINATE_BOUNDS.LATITUDE.MAX &&
    point.longitude >= COORDINATE_BOUNDS.LONGITUDE.MIN &&
    point.longitude <= COORDINATE_BOUNDS.LONGITUDE.MAX
  );
}

/**
 * Parse a decimal number from a query value. Blank, non-numeric and
 * non-finite values yield null.
 */
export function parseDecimal(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Read the query point from `gps_latitude` / `gps_longitude`.
 * Returns null when either is missing, unparseable or out of range; callers
 * then skip distance ranking rather than failing the request.
 */
export function parseGpsPoint(params: QueryParams): Coordinates | null {
  const latitude = parseDecimal(params.gps_latitude);
  const longitude = parseDecimal(params.gps_longitude);
  if (latitude === null || longitude === null) return null;

  const point = { latitude, longitude };
  return isValidCoordinates(point) ? point : null;
}

/**
 * Radius for nearby search; falls back to the default when absent or unparseable
 */
export function parseRadiusKm(raw: string | undefined, defaultRadiusKm: number): number {
  return parseDecimal(raw) ?? defaultRadiusKm;
}

/**
 * A row annotated with its distance from the query point
 */
export interface Ranked<T> {
  row: T;
  distanceKm: number;
}

/**
 * Rank mode: annotate every row and sort ascending by distance.
 * Equal distances keep a stable order by id.
 */
export function rankByDistance<T extends { id: string }>(
  rows: readonly T[],
  origin: Coordinates,
  locate: (row: T) => Coordinates
): Ranked<T>[] {
  return rows
    .map(row => ({ row, distanceKm: haversineDistanceKm(origin, locate(row)) }))
    .sort((left, right) =>
      left.distanceKm - right.distanceKm ||
      (left.row.id < right.row.id ? -1 : left.row.id > right.row.id ? 1 : 0)
    );
}

/**
 * Radius mode: rank mode restricted to rows within `radiusKm` (inclusive)
 */
export function withinRadius<T extends { id: string }>(
  rows: readonly T[],
  origin: Coordinates,
  radiusKm: number,
  locate: (row: T) => Coordinates
): Ranked<T>[] {
  return rankByDistance(rows, origin, locate).filter(ranked => ranked.distanceKm <= radiusKm);
}
