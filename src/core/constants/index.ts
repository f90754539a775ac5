/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * Roles, ride statuses and query constants shared by every module.
 * =============================================================================
 */

// =============================================================================
// USER ROLES
// =============================================================================

export enum UserRole {
  ADMIN = 'admin',
  DRIVER = 'driver',
  RIDER = 'rider',
  DISPATCHER = 'dispatcher'
}

/**
 * Roles accepted by the `role` list filter.
 * Dispatcher is a valid stored role but is not filterable.
 */
export const FILTERABLE_ROLES: readonly UserRole[] = [
  UserRole.ADMIN,
  UserRole.DRIVER,
  UserRole.RIDER
];

/**
 * Roles that may be referenced as the rider / driver of a ride
 */
export const RIDER_ELIGIBLE_ROLES: readonly UserRole[] = [UserRole.RIDER, UserRole.ADMIN];
export const DRIVER_ELIGIBLE_ROLES: readonly UserRole[] = [UserRole.DRIVER, UserRole.ADMIN];

// =============================================================================
// RIDE STATUS
// =============================================================================

/**
 * Ride states. Any status may be written after any other.
 */
export enum RideStatus {
  EN_ROUTE = 'en-route',
  PICKUP = 'pickup',
  DROPOFF = 'dropoff',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled'
}

export const RIDE_STATUSES: readonly RideStatus[] = Object.values(RideStatus);

/**
 * Statuses of a ride that is still under way
 */
export const ACTIVE_RIDE_STATUSES: readonly RideStatus[] = [
  RideStatus.EN_ROUTE,
  RideStatus.PICKUP,
  RideStatus.DROPOFF
];

// =============================================================================
// TIME WINDOWS
// =============================================================================

export const TODAY_WINDOW_HOURS = 24;
export const WEEK_WINDOW_HOURS = 7 * 24;

// =============================================================================
// GEO
// =============================================================================

export const COORDINATE_BOUNDS = {
  LATITUDE: { MIN: -90, MAX: 90 },
  LONGITUDE: { MIN: -180, MAX: 180 }
} as const;

/**
 * Decimal places of distances surfaced to callers
 */
export const DISTANCE_DECIMALS = 2;

// =============================================================================
// PAGINATION
// =============================================================================

export const MAX_PAGE_SIZE = 100;
