/**
 * =============================================================================
 * RIDE SERVICE - Unit Tests
 * =============================================================================
 *
 * Fixed clock at 2024-06-01T12:00Z. Query point P = (37.7749, -122.4194).
 * =============================================================================
 */

import { RideStatus, UserRole } from '../core/constants';
import { DatabaseService } from '../shared/database/db';
import { RideEntity, UserEntity } from '../shared/database/repository.interface';
import { logError } from '../shared/services/logger.service';
import { ErrorCode, NotFoundError, ValidationError } from '../shared/types/error.types';
import { RideService } from '../modules/ride/ride.service';
import { createTestStore, fixedClock, hoursAgo, seedRide, seedUser } from './helpers/fixtures';

// Mock logger to suppress output during tests
jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    log: jest.fn(),
  },
  logError: jest.fn(),
}));

const FIRST_PAGE = { page: 1, limit: 20 };
const POINT = { gps_latitude: '37.7749', gps_longitude: '-122.4194' };

describe('RideService', () => {
  let store: DatabaseService;
  let service: RideService;

  let rider: UserEntity;
  let driverOne: UserEntity;
  let driverTwo: UserEntity;

  // Distances from P: here 0, near 0.01, mid 1.11, far 4146.24
  let here: RideEntity;
  let near: RideEntity;
  let mid: RideEntity;
  let far: RideEntity;

  beforeEach(async () => {
    jest.clearAllMocks();
    store = createTestStore();
    service = new RideService(store.users, store.rides, store.rideEvents, fixedClock, { nearbyDefaultRadiusKm: 10 });

    rider = await seedUser(store, 'rex@example.com', UserRole.RIDER);
    driverOne = await seedUser(store, 'abe@example.com', UserRole.DRIVER);
    driverTwo = await seedUser(store, 'bea@example.com', UserRole.DRIVER);

    here = await seedRide(store, rider.id, driverOne.id, {
      status: RideStatus.COMPLETED,
      pickupTime: hoursAgo(3)
    });
    near = await seedRide(store, rider.id, driverTwo.id, {
      pickupLatitude: 37.775,
      pickupLongitude: -122.4195,
      pickupTime: hoursAgo(2)
    });
    mid = await seedRide(store, rider.id, driverOne.id, {
      status: RideStatus.PICKUP,
      pickupLatitude: 37.7849,
      pickupTime: hoursAgo(1)
    });
    far = await seedRide(store, rider.id, driverTwo.id, {
      status: RideStatus.CANCELLED,
      pickupLatitude: 40,
      pickupLongitude: -74,
      pickupTime: hoursAgo(4)
    });
  });

  // ===========================================================================
  // LISTING
  // ===========================================================================

  describe('listRides', () => {
    it('should order by pickup time, newest first, by default', async () => {
      const page = await service.listRides({}, FIRST_PAGE);

      expect(page.items.map(ride => ride.id)).toEqual([mid.id, near.id, here.id, far.id]);
      expect(page.items[0]).not.toHaveProperty('distanceFromPoint');
    });

    it('should combine status and driver filters', async () => {
      const page = await service.listRides({ status: 'completed', driver_id: driverOne.id }, FIRST_PAGE);

      expect(page.items.map(ride => ride.id)).toEqual([here.id]);
      expect(page.total).toBe(1);
    });

    it('should drop an unparseable start_date', async () => {
      const page = await service.listRides({ start_date: 'not-a-date' }, FIRST_PAGE);
      expect(page.total).toBe(4);
    });

    it('should filter on pickup time range', async () => {
      const page = await service.listRides({ start_date: hoursAgo(2.5), end_date: hoursAgo(1.5) }, FIRST_PAGE);
      expect(page.items.map(ride => ride.id)).toEqual([near.id]);
    });

    it('should search participant names and emails', async () => {
      const page = await service.listRides({ search: 'BEA' }, FIRST_PAGE);
      expect(page.items.map(ride => ride.id)).toEqual([near.id, far.id]);
    });

    it('should honour an explicit ordering', async () => {
      const page = await service.listRides({ ordering: 'pickup_time' }, FIRST_PAGE);
      expect(page.items.map(ride => ride.id)).toEqual([far.id, here.id, near.id, mid.id]);
    });

    it('should rank by distance when a GPS point is given', async () => {
      const page = await service.listRides(POINT, FIRST_PAGE);

      expect(page.items.map(ride => ride.id)).toEqual([here.id, near.id, mid.id, far.id]);
      expect(page.items.map(ride => ride.distanceFromPoint)).toEqual([0, 0.01, 1.11, 4146.24]);
    });

    it('should rank by distance even when an ordering is requested', async () => {
      const page = await service.listRides({ ...POINT, ordering: '-pickup_time' }, FIRST_PAGE);
      expect(page.items.map(ride => ride.id)).toEqual([here.id, near.id, mid.id, far.id]);
    });

    it('should paginate after ranking', async () => {
      const page = await service.listRides(POINT, { page: 2, limit: 2 });

      expect(page.items.map(ride => ride.id)).toEqual([mid.id, far.id]);
      expect(page.total).toBe(4);
      expect(page.hasMore).toBe(false);
    });

    it('should fall back to the default order for an out-of-range point', async () => {
      const page = await service.listRides({ gps_latitude: '91', gps_longitude: '0' }, FIRST_PAGE);
      expect(page.items.map(ride => ride.id)).toEqual([mid.id, near.id, here.id, far.id]);
    });

    it('should project participant names', async () => {
      const page = await service.listRides({ status: 'completed' }, FIRST_PAGE);

      expect(page.items[0]).toMatchObject({
        riderEmail: 'rex@example.com',
        driverEmail: 'abe@example.com',
        riderName: 'Rex Test',
        driverName: 'Abe Test',
        todaysEventsCount: 0
      });
    });
  });

  describe('listActiveRides', () => {
    it('should keep en-route, pickup and dropoff rides only', async () => {
      const page = await service.listActiveRides({}, FIRST_PAGE);
      expect(page.items.map(ride => ride.id)).toEqual([mid.id, near.id]);
    });
  });

  describe('nearbyRides', () => {
    it('should return rides inside the radius, nearest first', async () => {
      const result = await service.nearbyRides({ ...POINT, radius: '1' });

      expect(result.center).toEqual({ latitude: 37.7749, longitude: -122.4194 });
      expect(result.radiusKm).toBe(1);
      expect(result.count).toBe(2);
      expect(result.rides.map(ride => ride.id)).toEqual([here.id, near.id]);
    });

    it('should use the default radius when none is given', async () => {
      const result = await service.nearbyRides(POINT);

      expect(result.radiusKm).toBe(10);
      expect(result.rides.map(ride => ride.id)).toEqual([here.id, near.id, mid.id]);
    });

    it('should apply ride filters inside the radius', async () => {
      const result = await service.nearbyRides({ ...POINT, status: 'pickup' });
      expect(result.rides.map(ride => ride.id)).toEqual([mid.id]);
    });

    it('should return nothing for a negative radius', async () => {
      const result = await service.nearbyRides({ ...POINT, radius: '-5' });
      expect(result.count).toBe(0);
    });

    it('should reject a missing point', async () => {
      await expect(service.nearbyRides({ gps_latitude: '37.7749' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // ===========================================================================
  // DETAIL
  // ===========================================================================

  describe('getRide', () => {
    it('should include only events from the last 24 hours, newest first', async () => {
      const recent = await store.rideEvents.create({ rideId: near.id, description: 'Status changed to pickup', createdAt: hoursAgo(1) });
      const edge = await store.rideEvents.create({ rideId: near.id, description: 'Driver assigned', createdAt: hoursAgo(23 + 59 / 60) });
      await store.rideEvents.create({ rideId: near.id, description: 'Ride requested', createdAt: hoursAgo(24 + 1 / 60) });

      const detail = await service.getRide(near.id);

      expect(detail.todaysEventsCount).toBe(2);
      expect(detail.todaysRideEvents).toEqual([
        { id: recent.id, description: 'Status changed to pickup', createdAt: recent.createdAt },
        { id: edge.id, description: 'Driver assigned', createdAt: edge.createdAt }
      ]);
    });

    it('should expose participants and location pairs', async () => {
      const detail = await service.getRide(mid.id);

      expect(detail.rider?.email).toBe('rex@example.com');
      expect(detail.driver?.fullName).toBe('Abe Test');
      expect(detail.pickupLocation).toEqual([37.7849, -122.4194]);
      expect(detail.dropoffLocation).toEqual([37.7849, -122.4094]);
      expect(detail.distanceFromPoint).toBeNull();
    });

    it('should add the distance when a point is given', async () => {
      const detail = await service.getRide(mid.id, POINT);
      expect(detail.distanceFromPoint).toBe(1.11);
    });

    it('should 404 for an unknown ride', async () => {
      await expect(service.getRide('missing')).rejects.toMatchObject({
        statusCode: 404,
        code: ErrorCode.RIDE_NOT_FOUND,
        message: 'Ride not found'
      });
    });
  });

  describe('listRideEvents', () => {
    it('should return every event of the ride, newest first', async () => {
      const older = await store.rideEvents.create({ rideId: here.id, description: 'Ride requested', createdAt: hoursAgo(48) });
      const newer = await store.rideEvents.create({ rideId: here.id, description: 'Ride completed', createdAt: hoursAgo(2) });
      await store.rideEvents.create({ rideId: near.id, description: 'Ride requested' });

      const events = await service.listRideEvents(here.id);

      expect(events.map(event => event.id)).toEqual([newer.id, older.id]);
      expect(events[0].timeSinceCreated).toBe('2 hours ago');
    });
  });

  describe('getStats', () => {
    it('should count every status', async () => {
      expect(await service.getStats()).toEqual({
        totalRides: 4,
        activeRides: 2,
        completedRides: 1,
        cancelledRides: 1,
        byStatus: {
          'en-route': 1,
          pickup: 1,
          dropoff: 0,
          completed: 1,
          cancelled: 1
        }
      });
    });
  });

  // ===========================================================================
  // WRITES
  // ===========================================================================

  describe('createRide', () => {
    const coordinates = {
      pickupLatitude: 37.7749,
      pickupLongitude: -122.4194,
      dropoffLatitude: 37.7849,
      dropoffLongitude: -122.4094,
      pickupTime: '2024-06-01T13:00:00.000Z'
    };

    it('should create a ride between eligible users', async () => {
      const detail = await service.createRide({
        status: RideStatus.EN_ROUTE,
        riderId: rider.id,
        driverId: driverOne.id,
        ...coordinates
      });

      expect(detail.status).toBe(RideStatus.EN_ROUTE);
      expect(detail.rider?.id).toBe(rider.id);
      expect(detail.todaysRideEvents).toEqual([]);
      expect(await store.rides.count()).toBe(5);
    });

    it('should accept an admin in either seat', async () => {
      const admin = await seedUser(store, 'ada@example.com', UserRole.ADMIN);

      await expect(service.createRide({
        status: RideStatus.EN_ROUTE,
        riderId: admin.id,
        driverId: driverOne.id,
        ...coordinates
      })).resolves.toMatchObject({ rider: { email: 'ada@example.com' } });
    });

    it('should reject a rider in the driver seat', async () => {
      const other = await seedUser(store, 'sam@example.com', UserRole.RIDER);

      await expect(service.createRide({
        status: RideStatus.EN_ROUTE,
        riderId: rider.id,
        driverId: other.id,
        ...coordinates
      })).rejects.toMatchObject({
        statusCode: 400,
        details: { fields: [{ field: 'driverId', message: 'Must reference an existing user with role driver or admin' }] }
      });
    });

    it('should reject unknown participants on both sides', async () => {
      await expect(service.createRide({
        status: RideStatus.EN_ROUTE,
        riderId: 'ghost-rider',
        driverId: 'ghost-driver',
        ...coordinates
      })).rejects.toMatchObject({
        message: 'Invalid ride participants',
        details: {
          fields: [
            { field: 'riderId', message: 'Must reference an existing user with role rider or admin' },
            { field: 'driverId', message: 'Must reference an existing user with role driver or admin' }
          ]
        }
      });
    });
  });

  describe('updateRide', () => {
    it('should record a status change as a ride event', async () => {
      const detail = await service.updateRide(near.id, { status: RideStatus.PICKUP });

      expect(detail.status).toBe(RideStatus.PICKUP);
      expect(detail.todaysRideEvents.map(event => event.description)).toEqual([
        'Status changed from en-route to pickup'
      ]);
    });

    it('should not record an event when the status is unchanged', async () => {
      await service.updateRide(near.id, { status: RideStatus.EN_ROUTE, pickupLatitude: 37.7 });
      expect(await store.rideEvents.count()).toBe(0);
    });

    it('should keep the update when the event write fails', async () => {
      const failure = new Error('disk full');
      jest.spyOn(store.rideEvents, 'create').mockRejectedValueOnce(failure);

      await service.updateRide(near.id, { status: RideStatus.CANCELLED });

      expect((await store.rides.findById(near.id))?.status).toBe(RideStatus.CANCELLED);
      expect(logError).toHaveBeenCalledWith('Failed to record ride status change', failure);
    });

    it('should validate a swapped participant against the existing one', async () => {
      await expect(service.updateRide(near.id, { driverId: rider.id })).rejects.toMatchObject({
        message: 'Rider and driver must be different users'
      });
    });
  });

  describe('deleteRide', () => {
    it('should delete the ride and its events', async () => {
      await store.rideEvents.create({ rideId: here.id, description: 'Ride requested' });
      await store.rideEvents.create({ rideId: here.id, description: 'Ride completed' });
      await store.rideEvents.create({ rideId: near.id, description: 'Ride requested' });

      expect(await service.deleteRide(here.id)).toEqual({ eventsDeleted: 2 });
      expect(await store.rides.findById(here.id)).toBeNull();
      expect(await store.rideEvents.count()).toBe(1);
    });

    it('should 404 for an unknown ride', async () => {
      await expect(service.deleteRide('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
