/**
 * =============================================================================
 * RIDE MODULE - SERVICE
 * =============================================================================
 *
 * Ride queries and writes.
 *
 * Listing runs the filter pipeline, then one of two orderings:
 * - no GPS point: the requested (or default) ordering, paginated by the store
 * - GPS point (rank mode): every matching ride is fetched, sorted by distance
 *   from the point to its pickup, then paginated here
 *
 * nearby is radius mode: rank mode bounded to rides within radius km.
 * =============================================================================
 */

import { config } from '../../config/environment';
import {
  ACTIVE_RIDE_STATUSES,
  DRIVER_ELIGIBLE_ROLES,
  RIDE_STATUSES,
  RIDER_ELIGIBLE_ROLES,
  RideStatus,
  UserRole
} from '../../core/constants';
import { db } from '../../shared/database/db';
import {
  IRideEventRepository,
  IRideRepository,
  IUserRepository,
  RideEntity
} from '../../shared/database/repository.interface';
import {
  activeRidePredicate,
  buildRideFilters,
  DEFAULT_EVENT_ORDER,
  DEFAULT_RIDE_ORDER,
  parseOrdering,
  RIDE_ORDERING_FIELDS
} from '../../shared/query/filter-pipeline';
import { Clock, systemClock } from '../../shared/query/time-window';
import { logger, logError } from '../../shared/services/logger.service';
import {
  Coordinates,
  Page,
  PaginationParams,
  QueryParams,
  paginate,
  pageWindow,
  storePage
} from '../../shared/types/api.types';
import { ErrorCode, NotFoundError, ValidationError } from '../../shared/types/error.types';
import {
  haversineDistanceKm,
  parseGpsPoint,
  parseRadiusKm,
  rankByDistance,
  withinRadius
} from '../../shared/utils/geospatial.utils';
import { RideEventView, toRideEventView } from '../ride-event/ride-event.projection';
import {
  loadRideContext,
  pickupPoint,
  RideDetail,
  RideListItem,
  toRideDetail,
  toRideListItem
} from './ride.projection';
import { CreateRideInput, UpdateRideInput } from './ride.schema';

export interface NearbyRides {
  center: Coordinates;
  radiusKm: number;
  count: number;
  rides: RideListItem[];
}

export interface RideStats {
  totalRides: number;
  activeRides: number;
  completedRides: number;
  cancelledRides: number;
  byStatus: Record<RideStatus, number>;
}

export interface RideServiceOptions {
  nearbyDefaultRadiusKm: number;
}

export class RideService {
  constructor(
    private readonly users: IUserRepository,
    private readonly rides: IRideRepository,
    private readonly rideEvents: IRideEventRepository,
    private readonly clock: Clock = systemClock,
    private readonly options: RideServiceOptions = { nearbyDefaultRadiusKm: config.query.nearbyDefaultRadiusKm }
  ) {}

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * Filtered ride list; a valid GPS point switches to rank mode
   */
  async listRides(params: QueryParams, pagination: PaginationParams): Promise<Page<RideListItem>> {
    const predicates = buildRideFilters(params);
    const origin = parseGpsPoint(params);
    const reference = this.clock();

    if (origin) {
      const candidates = await this.rides.findMany({ predicates, order: DEFAULT_RIDE_ORDER });
      const page = paginate(rankByDistance(candidates, origin, pickupPoint), pagination);
      const context = await loadRideContext(
        page.items.map(ranked => ranked.row),
        this.users,
        this.rideEvents,
        reference
      );
      return {
        ...page,
        items: page.items.map(ranked => toRideListItem(ranked.row, context, ranked.distanceKm))
      };
    }

    const order = parseOrdering(params.ordering, RIDE_ORDERING_FIELDS, DEFAULT_RIDE_ORDER);
    const [total, rows] = await Promise.all([
      this.rides.count(predicates),
      this.rides.findMany({ predicates, order, ...pageWindow(pagination) })
    ]);
    const context = await loadRideContext(rows, this.users, this.rideEvents, reference);
    return storePage(rows.map(ride => toRideListItem(ride, context)), total, pagination);
  }

  /**
   * Rides still under way (en-route, pickup, dropoff)
   */
  async listActiveRides(params: QueryParams, pagination: PaginationParams): Promise<Page<RideListItem>> {
    const predicates = [activeRidePredicate()];
    const order = parseOrdering(params.ordering, RIDE_ORDERING_FIELDS, DEFAULT_RIDE_ORDER);

    const [total, rows] = await Promise.all([
      this.rides.count(predicates),
      this.rides.findMany({ predicates, order, ...pageWindow(pagination) })
    ]);
    const context = await loadRideContext(rows, this.users, this.rideEvents, this.clock());
    return storePage(rows.map(ride => toRideListItem(ride, context)), total, pagination);
  }

  /**
   * Radius mode. The point is mandatory here; the usual ride filters still apply.
   */
  async nearbyRides(params: QueryParams): Promise<NearbyRides> {
    const origin = parseGpsPoint(params);
    if (!origin) {
      throw new ValidationError('gps_latitude and gps_longitude must be valid coordinates', {
        fields: [
          { field: 'gps_latitude', message: 'Required, between -90 and 90' },
          { field: 'gps_longitude', message: 'Required, between -180 and 180' }
        ]
      });
    }

    const radiusKm = parseRadiusKm(params.radius, this.options.nearbyDefaultRadiusKm);
    const candidates = await this.rides.findMany({ predicates: buildRideFilters(params), order: DEFAULT_RIDE_ORDER });
    const inRange = withinRadius(candidates, origin, radiusKm, pickupPoint);

    const context = await loadRideContext(
      inRange.map(ranked => ranked.row),
      this.users,
      this.rideEvents,
      this.clock()
    );

    return {
      center: origin,
      radiusKm,
      count: inRange.length,
      rides: inRange.map(ranked => toRideListItem(ranked.row, context, ranked.distanceKm))
    };
  }

  /**
   * Ride detail with the last 24 hours of events; distanceFromPoint is set
   * when a valid GPS point is given
   */
  async getRide(rideId: string, params: QueryParams = {}): Promise<RideDetail> {
    const ride = await this.requireRide(rideId);
    return this.detail(ride, parseGpsPoint(params));
  }

  /**
   * Every event of one ride, newest first
   */
  async listRideEvents(rideId: string): Promise<RideEventView[]> {
    await this.requireRide(rideId);
    const reference = this.clock();
    const events = await this.rideEvents.findMany({
      predicates: [{ kind: 'eq', field: 'rideId', value: rideId }],
      order: DEFAULT_EVENT_ORDER
    });
    return events.map(event => toRideEventView(event, reference));
  }

  /**
   * Counts over the whole collection, every status present
   */
  async getStats(): Promise<RideStats> {
    const [totalRides, perStatus] = await Promise.all([
      this.rides.count(),
      Promise.all(RIDE_STATUSES.map(async status => ({
        status,
        count: await this.rides.count([{ kind: 'eq', field: 'status', value: status }])
      })))
    ]);

    const byStatus = emptyStatusCounts();
    for (const { status, count } of perStatus) {
      byStatus[status] = count;
    }

    return {
      totalRides,
      activeRides: ACTIVE_RIDE_STATUSES.reduce((sum, status) => sum + byStatus[status], 0),
      completedRides: byStatus[RideStatus.COMPLETED],
      cancelledRides: byStatus[RideStatus.CANCELLED],
      byStatus
    };
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  async createRide(input: CreateRideInput): Promise<RideDetail> {
    await this.assertParticipants(input.riderId, input.driverId);

    const ride = await this.rides.create(input);
    logger.info('Ride created', { rideId: ride.id, status: ride.status });
    return this.detail(ride, null);
  }

  /**
   * Patch a ride. A status change is recorded as a ride event in a second,
   * independent write; if that write fails the ride update stands.
   */
  async updateRide(rideId: string, input: UpdateRideInput): Promise<RideDetail> {
    const existing = await this.requireRide(rideId);

    if (input.riderId !== undefined || input.driverId !== undefined) {
      await this.assertParticipants(input.riderId ?? existing.riderId, input.driverId ?? existing.driverId);
    }

    const updated = await this.rides.update(rideId, input);
    if (!updated) {
      throw new NotFoundError('Ride', ErrorCode.RIDE_NOT_FOUND);
    }
    logger.info('Ride updated', { rideId, fields: Object.keys(input) });

    if (input.status !== undefined && input.status !== existing.status) {
      await this.recordStatusChange(rideId, existing.status, input.status);
    }

    return this.detail(updated, null);
  }

  /**
   * Hard delete; the ride's events go with it
   */
  async deleteRide(rideId: string): Promise<{ eventsDeleted: number }> {
    await this.requireRide(rideId);

    const eventsDeleted = await this.rideEvents.deleteByRide(rideId);
    const deleted = await this.rides.delete(rideId);
    if (!deleted) {
      throw new NotFoundError('Ride', ErrorCode.RIDE_NOT_FOUND);
    }

    logger.info('Ride deleted', { rideId, eventsDeleted });
    return { eventsDeleted };
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async detail(ride: RideEntity, origin: Coordinates | null): Promise<RideDetail> {
    const context = await loadRideContext([ride], this.users, this.rideEvents, this.clock());
    const distanceKm = origin ? haversineDistanceKm(origin, pickupPoint(ride)) : null;
    return toRideDetail(ride, context, distanceKm);
  }

  private async recordStatusChange(rideId: string, from: RideStatus, to: RideStatus): Promise<void> {
    try {
      await this.rideEvents.create({ rideId, description: `Status changed from ${from} to ${to}` });
    } catch (error) {
      logError('Failed to record ride status change', error);
    }
  }

  private async requireRide(rideId: string): Promise<RideEntity> {
    const ride = await this.rides.findById(rideId);
    if (!ride) {
      throw new NotFoundError('Ride', ErrorCode.RIDE_NOT_FOUND);
    }
    return ride;
  }

  /**
   * Rider must be a rider or admin, driver a driver or admin, and they must differ
   */
  private async assertParticipants(riderId: string, driverId: string): Promise<void> {
    if (riderId === driverId) {
      throw new ValidationError('Rider and driver must be different users', {
        fields: [{ field: 'driverId', message: 'Must differ from riderId' }]
      });
    }

    const [rider, driver] = await Promise.all([
      this.users.findById(riderId),
      this.users.findById(driverId)
    ]);

    const problems: Array<{ field: string; message: string }> = [];
    if (!rider || !RIDER_ELIGIBLE_ROLES.includes(rider.role)) {
      problems.push({ field: 'riderId', message: eligibilityMessage(RIDER_ELIGIBLE_ROLES) });
    }
    if (!driver || !DRIVER_ELIGIBLE_ROLES.includes(driver.role)) {
      problems.push({ field: 'driverId', message: eligibilityMessage(DRIVER_ELIGIBLE_ROLES) });
    }

    if (problems.length > 0) {
      throw new ValidationError('Invalid ride participants', { fields: problems });
    }
  }
}

function emptyStatusCounts(): Record<RideStatus, number> {
  return {
    [RideStatus.EN_ROUTE]: 0,
    [RideStatus.PICKUP]: 0,
    [RideStatus.DROPOFF]: 0,
    [RideStatus.COMPLETED]: 0,
    [RideStatus.CANCELLED]: 0
  };
}

function eligibilityMessage(roles: readonly UserRole[]): string {
  return `Must reference an existing user with role ${roles.join(' or ')}`;
}

export const rideService = new RideService(db.users, db.rides, db.rideEvents);
