/**
 * =============================================================================
 * FILTER PIPELINE
 * =============================================================================
 *
 * Turns recognized query parameters into one conjunctive predicate list and
 * an ordering. Absence of a parameter means "no constraint".
 *
 * Unparseable optional values (dates, booleans outside the accepted set,
 * unknown ordering fields, roles outside the filterable set) never raise:
 * the constraint is simply not applied.
 * =============================================================================
 */

import { FILTERABLE_ROLES, ACTIVE_RIDE_STATUSES } from '../../core/constants';
import { QueryParams } from '../types/api.types';
import { RideEventField, RideField, UserField } from '../database/repository.interface';
import { OrderTerm, Predicate } from './predicate';

// =============================================================================
// PARAMETER PARSING
// =============================================================================

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d{1,6})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or date-time. A trailing `Z` means +00:00; values
 * without an offset (including bare dates) are read as UTC.
 * Returns null for anything malformed, including impossible calendar dates.
 */
export function parseTimestamp(raw: string | undefined): Date | null {
  if (raw === undefined) return null;
  const match = ISO_TIMESTAMP.exec(raw.trim());
  if (!match) return null;

  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction, offset] = match;

  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null;

  // years 0-99 stay as written (Date.UTC would map them to 19xx)
  const calendarDay = new Date(0);
  calendarDay.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  if (
    calendarDay.getUTCFullYear() !== Number(year) ||
    calendarDay.getUTCMonth() !== Number(month) - 1 ||
    calendarDay.getUTCDate() !== Number(day)
  ) {
    return null;
  }

  let zone = '+00:00';
  if (offset && offset !== 'Z') {
    zone = offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
  }
  const millis = fraction ? fraction.slice(1).padEnd(3, '0').slice(0, 3) : '000';

  const parsed = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${zone}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

const TRUTHY_FLAGS = ['true', '1', 'yes'];

/**
 * `true`, `1` and `yes` (any case) are true; every other value is false
 */
export function parseBooleanFlag(raw: string): boolean {
  return TRUTHY_FLAGS.includes(raw.trim().toLowerCase());
}

function present(raw: string | undefined): string | null {
  return raw === undefined || raw === '' ? null : raw;
}

function dateRange<F extends string>(field: F, params: QueryParams): Predicate<F> | null {
  const from = parseTimestamp(present(params.start_date) ?? undefined);
  const to = parseTimestamp(present(params.end_date) ?? undefined);
  if (!from && !to) return null;
  return { kind: 'range', field, from: from ?? undefined, to: to ?? undefined };
}

function search<F extends string>(fields: readonly F[], params: QueryParams): Predicate<F> | null {
  const term = present(params.search?.trim());
  return term === null ? null : { kind: 'contains', fields, term };
}

function compact<F extends string>(predicates: Array<Predicate<F> | null>): Predicate<F>[] {
  return predicates.filter((predicate): predicate is Predicate<F> => predicate !== null);
}

// =============================================================================
// ORDERING
// =============================================================================

/**
 * Parse `ordering` ("field" ascending, "-field" descending, comma-separated).
 * Fields outside the allow-list are dropped; if nothing valid remains the
 * collection default applies.
 */
export function parseOrdering<F extends string>(
  raw: string | undefined,
  allowed: ReadonlyMap<string, F>,
  fallback: readonly OrderTerm<F>[]
): OrderTerm<F>[] {
  if (!raw) return [...fallback];

  const terms: OrderTerm<F>[] = [];
  for (const token of raw.split(',')) {
    const trimmed = token.trim();
    const descending = trimmed.startsWith('-');
    const field = allowed.get(descending ? trimmed.slice(1) : trimmed);
    if (field !== undefined) {
      terms.push({ field, direction: descending ? 'desc' : 'asc' });
    }
  }

  return terms.length > 0 ? terms : [...fallback];
}

export const RIDE_ORDERING_FIELDS: ReadonlyMap<string, RideField> = new Map<string, RideField>([
  ['id', 'id'],
  ['status', 'status'],
  ['pickup_time', 'pickupTime'],
  ['created_at', 'createdAt'],
  ['updated_at', 'updatedAt']
]);

export const USER_ORDERING_FIELDS: ReadonlyMap<string, UserField> = new Map<string, UserField>([
  ['id', 'id'],
  ['first_name', 'firstName'],
  ['last_name', 'lastName'],
  ['email', 'email'],
  ['created_at', 'createdAt']
]);

export const EVENT_ORDERING_FIELDS: ReadonlyMap<string, RideEventField> = new Map<string, RideEventField>([
  ['id', 'id'],
  ['description', 'description'],
  ['created_at', 'createdAt']
]);

export const DEFAULT_RIDE_ORDER: readonly OrderTerm<RideField>[] = [{ field: 'pickupTime', direction: 'desc' }];
export const DEFAULT_USER_ORDER: readonly OrderTerm<UserField>[] = [{ field: 'createdAt', direction: 'desc' }];
export const DEFAULT_EVENT_ORDER: readonly OrderTerm<RideEventField>[] = [{ field: 'createdAt', direction: 'desc' }];

// =============================================================================
// PER-COLLECTION FILTERS
// =============================================================================

export const RIDE_SEARCH_FIELDS: readonly RideField[] = [
  'rider.firstName',
  'rider.lastName',
  'rider.email',
  'driver.firstName',
  'driver.lastName',
  'driver.email'
];

export const USER_SEARCH_FIELDS: readonly UserField[] = ['firstName', 'lastName', 'email', 'phoneNumber'];

export const EVENT_SEARCH_FIELDS: readonly RideEventField[] = ['description'];

/**
 * status, rider_id, driver_id, start_date/end_date (pickup time), search
 */
export function buildRideFilters(params: QueryParams): Predicate<RideField>[] {
  const status = present(params.status);
  const riderId = present(params.rider_id);
  const driverId = present(params.driver_id);

  return compact<RideField>([
    status === null ? null : { kind: 'eq', field: 'status', value: status },
    riderId === null ? null : { kind: 'eq', field: 'riderId', value: riderId },
    driverId === null ? null : { kind: 'eq', field: 'driverId', value: driverId },
    dateRange<RideField>('pickupTime', params),
    search(RIDE_SEARCH_FIELDS, params)
  ]);
}

/**
 * role (filterable roles only), is_active, start_date/end_date (joined), search
 */
export function buildUserFilters(params: QueryParams): Predicate<UserField>[] {
  const role = FILTERABLE_ROLES.find(candidate => candidate === params.role);

  return compact<UserField>([
    role === undefined ? null : { kind: 'eq', field: 'role', value: role },
    params.is_active === undefined ? null : { kind: 'eq', field: 'isActive', value: parseBooleanFlag(params.is_active) },
    dateRange<UserField>('createdAt', params),
    search(USER_SEARCH_FIELDS, params)
  ]);
}

const EVENT_TYPES = ['pickup', 'dropoff'];

/**
 * ride_id, event_type (pickup | dropoff), start_date/end_date (created), search
 */
export function buildEventFilters(params: QueryParams): Predicate<RideEventField>[] {
  const rideId = present(params.ride_id);
  const eventType = params.event_type?.trim().toLowerCase();

  return compact<RideEventField>([
    rideId === null ? null : { kind: 'eq', field: 'rideId', value: rideId },
    eventType !== undefined && EVENT_TYPES.includes(eventType)
      ? { kind: 'contains', fields: ['description'], term: eventType }
      : null,
    dateRange<RideEventField>('createdAt', params),
    search(EVENT_SEARCH_FIELDS, params)
  ]);
}

/**
 * Rides where the user is either the rider or the driver
 */
export function participantPredicate(userId: string): Predicate<RideField> {
  return {
    kind: 'or',
    predicates: [
      { kind: 'eq', field: 'riderId', value: userId },
      { kind: 'eq', field: 'driverId', value: userId }
    ]
  };
}

export function activeRidePredicate(): Predicate<RideField> {
  return { kind: 'in', field: 'status', values: ACTIVE_RIDE_STATUSES };
}
