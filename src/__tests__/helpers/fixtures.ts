/**
 * Shared builders for service tests: a fresh in-memory store on a fixed clock.
 */

import { RideStatus, UserRole } from '../../core/constants';
import { DatabaseService } from '../../shared/database/db';
import { CreateInput, RideEntity, UserEntity } from '../../shared/database/repository.interface';

export const NOW = new Date('2024-06-01T12:00:00.000Z');

export const fixedClock = (): Date => NOW;

export function createTestStore(): DatabaseService {
  return new DatabaseService({ persist: false, now: fixedClock });
}

export function hoursAgo(hours: number): string {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000).toISOString();
}

export async function seedUser(
  store: DatabaseService,
  email: string,
  role: UserRole,
  overrides: Partial<CreateInput<UserEntity>> = {}
): Promise<UserEntity> {
  const name = email.split('@')[0];
  return store.users.create({
    role,
    firstName: name.charAt(0).toUpperCase() + name.slice(1),
    lastName: 'Test',
    email,
    phoneNumber: '555-0100',
    passwordHash: 'not-a-real-hash',
    isActive: true,
    isStaff: false,
    ...overrides
  });
}

export async function seedRide(
  store: DatabaseService,
  riderId: string,
  driverId: string,
  overrides: Partial<CreateInput<RideEntity>> = {}
): Promise<RideEntity> {
  return store.rides.create({
    status: RideStatus.EN_ROUTE,
    riderId,
    driverId,
    pickupLatitude: 37.7749,
    pickupLongitude: -122.4194,
    dropoffLatitude: 37.7849,
    dropoffLongitude: -122.4094,
    pickupTime: hoursAgo(1),
    ...overrides
  });
}
