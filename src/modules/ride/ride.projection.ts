/**
 * =============================================================================
 * RIDE MODULE - PROJECTIONS
 * =============================================================================
 *
 * List items and detail views for rides. Related users and the last 24 hours
 * of events are loaded once per page (two queries), never per row.
 * =============================================================================
 */

import { RideStatus, TODAY_WINDOW_HOURS } from '../../core/constants';
import {
  IRideEventRepository,
  IUserRepository,
  RideEntity,
  RideEventEntity,
  UserEntity
} from '../../shared/database/repository.interface';
import { DEFAULT_EVENT_ORDER } from '../../shared/query/filter-pipeline';
import { windowPredicate } from '../../shared/query/time-window';
import { Coordinates } from '../../shared/types/api.types';
import { roundDistanceKm } from '../../shared/utils/geospatial.utils';
import { fullName, toUserSummary, UserSummary } from '../user/user.projection';
import { RecentRideEvent, toRecentRideEvent } from '../ride-event/ride-event.projection';

export interface RideListItem {
  id: string;
  status: RideStatus;
  riderEmail: string;
  driverEmail: string;
  riderName: string;
  driverName: string;
  pickupTime: string;
  todaysEventsCount: number;
  pickupLatitude: number;
  pickupLongitude: number;
  /** present only when the list was ranked from a GPS point */
  distanceFromPoint?: number;
}

export interface RideDetail {
  id: string;
  status: RideStatus;
  rider: UserSummary | null;
  driver: UserSummary | null;
  pickupLatitude: number;
  pickupLongitude: number;
  dropoffLatitude: number;
  dropoffLongitude: number;
  pickupTime: string;
  pickupLocation: [number, number];
  dropoffLocation: [number, number];
  todaysRideEvents: RecentRideEvent[];
  todaysEventsCount: number;
  distanceFromPoint: number | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Related rows needed to project a set of rides
 */
export interface RideContext {
  users: ReadonlyMap<string, UserEntity>;
  /** events of the last 24 hours per ride, newest first */
  todaysEvents: ReadonlyMap<string, RideEventEntity[]>;
}

export async function loadRideContext(
  rides: readonly RideEntity[],
  users: IUserRepository,
  rideEvents: IRideEventRepository,
  reference: Date
): Promise<RideContext> {
  if (rides.length === 0) {
    return { users: new Map(), todaysEvents: new Map() };
  }

  const userIds = [...new Set(rides.flatMap(ride => [ride.riderId, ride.driverId]))];
  const rideIds = rides.map(ride => ride.id);

  const [participants, events] = await Promise.all([
    users.findByIds(userIds),
    rideEvents.findMany({
      predicates: [
        { kind: 'in', field: 'rideId', values: rideIds },
        windowPredicate('createdAt', reference, TODAY_WINDOW_HOURS)
      ],
      order: DEFAULT_EVENT_ORDER
    })
  ]);

  const todaysEvents = new Map<string, RideEventEntity[]>();
  for (const event of events) {
    const bucket = todaysEvents.get(event.rideId);
    if (bucket) {
      bucket.push(event);
    } else {
      todaysEvents.set(event.rideId, [event]);
    }
  }

  return {
    users: new Map(participants.map(user => [user.id, user])),
    todaysEvents
  };
}

export function toRideListItem(ride: RideEntity, context: RideContext, distanceKm?: number): RideListItem {
  const rider = context.users.get(ride.riderId);
  const driver = context.users.get(ride.driverId);

  return {
    id: ride.id,
    status: ride.status,
    riderEmail: rider?.email ?? '',
    driverEmail: driver?.email ?? '',
    riderName: rider ? fullName(rider) : '',
    driverName: driver ? fullName(driver) : '',
    pickupTime: ride.pickupTime,
    todaysEventsCount: context.todaysEvents.get(ride.id)?.length ?? 0,
    pickupLatitude: ride.pickupLatitude,
    pickupLongitude: ride.pickupLongitude,
    ...(distanceKm === undefined ? {} : { distanceFromPoint: roundDistanceKm(distanceKm) })
  };
}

export function toRideDetail(ride: RideEntity, context: RideContext, distanceKm: number | null): RideDetail {
  const rider = context.users.get(ride.riderId);
  const driver = context.users.get(ride.driverId);
  const todays = context.todaysEvents.get(ride.id) ?? [];

  return {
    id: ride.id,
    status: ride.status,
    rider: rider ? toUserSummary(rider) : null,
    driver: driver ? toUserSummary(driver) : null,
    pickupLatitude: ride.pickupLatitude,
    pickupLongitude: ride.pickupLongitude,
    dropoffLatitude: ride.dropoffLatitude,
    dropoffLongitude: ride.dropoffLongitude,
    pickupTime: ride.pickupTime,
    pickupLocation: [ride.pickupLatitude, ride.pickupLongitude],
    dropoffLocation: [ride.dropoffLatitude, ride.dropoffLongitude],
    todaysRideEvents: todays.map(toRecentRideEvent),
    todaysEventsCount: todays.length,
    distanceFromPoint: distanceKm === null ? null : roundDistanceKm(distanceKm),
    createdAt: ride.createdAt,
    updatedAt: ride.updatedAt
  };
}

export function pickupPoint(ride: RideEntity): Coordinates {
  return { latitude: ride.pickupLatitude, longitude: ride.pickupLongitude };
}
