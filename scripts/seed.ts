/**
 * Populate the JSON store with sample riders, drivers, an admin, a dispatcher,
 * rides around San Francisco and their events.
 *
 * Usage:
 *   SEED_PASSWORD=... npm run seed
 *
 * Users are matched by email, so running it twice adds no duplicate users.
 * Rides are topped up to RIDE_TARGET.
 */

import { RideStatus, RIDE_STATUSES, UserRole } from '../src/core/constants';
import { db } from '../src/shared/database/db';
import { UserEntity } from '../src/shared/database/repository.interface';
import { logger, logError } from '../src/shared/services/logger.service';
import { userService } from '../src/modules/user/user.service';
import { rideService } from '../src/modules/ride/ride.service';

const RIDE_TARGET = 12;
const SEED_PASSWORD = process.env.SEED_PASSWORD || 'seed-password';

interface SeedUser {
  email: string;
  firstName: string;
  lastName: string;
  phoneNumber: string;
  role: UserRole;
  isStaff: boolean;
}

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

function sampleUsers(): SeedUser[] {
  const users: SeedUser[] = [];
  for (let i = 1; i <= 6; i++) {
    users.push(
      { email: `rider${i}@example.com`, firstName: `Rider${i}`, lastName: 'Test', phoneNumber: `555-000${i}1`, role: UserRole.RIDER, isStaff: false },
      { email: `driver${i}@example.com`, firstName: `Driver${i}`, lastName: 'Test', phoneNumber: `555-000${i}2`, role: UserRole.DRIVER, isStaff: false }
    );
  }
  users.push(
    { email: 'admin@example.com', firstName: 'Admin', lastName: 'User', phoneNumber: '555-0100', role: UserRole.ADMIN, isStaff: true },
    { email: 'dispatcher@example.com', firstName: 'Dispatcher', lastName: 'User', phoneNumber: '555-0200', role: UserRole.DISPATCHER, isStaff: false }
  );
  return users;
}

function jitter(center: number, spread: number): number {
  return center + (Math.random() * 2 - 1) * spread;
}

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

function randomInt(max: number): number {
  return Math.floor(Math.random() * (max + 1));
}

async function ensureUser(seed: SeedUser): Promise<UserEntity> {
  const existing = await db.users.findByEmail(seed.email);
  if (existing) return existing;

  const created = await userService.createUser({
    ...seed,
    password: SEED_PASSWORD,
    passwordConfirm: SEED_PASSWORD
  });
  const stored = await db.users.findById(created.id);
  if (!stored) {
    throw new Error(`Seeded user ${seed.email} was not stored`);
  }
  return stored;
}

async function seedRide(riders: UserEntity[], drivers: UserEntity[], now: number): Promise<void> {
  const status: RideStatus = pick(RIDE_STATUSES);
  const pickupTime = now - randomInt(48) * HOUR_MS;

  const ride = await rideService.createRide({
    status,
    riderId: pick(riders).id,
    driverId: pick(drivers).id,
    pickupLatitude: jitter(37.77, 0.01),
    pickupLongitude: jitter(-122.41, 0.01),
    dropoffLatitude: jitter(37.78, 0.01),
    dropoffLongitude: jitter(-122.42, 0.01),
    pickupTime: new Date(pickupTime).toISOString()
  });

  // At least one event inside the last 24 hours
  await db.rideEvents.create({
    rideId: ride.id,
    description: `Status changed to ${status}`,
    createdAt: new Date(now - randomInt(23) * HOUR_MS - randomInt(59) * MINUTE_MS).toISOString()
  });

  // Pickup and dropoff events may fall outside the window
  if (Math.random() > 0.5) {
    await db.rideEvents.create({
      rideId: ride.id,
      description: 'Pickup completed',
      createdAt: new Date(pickupTime + 5 * MINUTE_MS).toISOString()
    });
  }
  if (Math.random() > 0.5) {
    await db.rideEvents.create({
      rideId: ride.id,
      description: 'Dropoff completed',
      createdAt: new Date(pickupTime + 30 * MINUTE_MS).toISOString()
    });
  }
}

async function run(): Promise<void> {
  const users: UserEntity[] = [];
  for (const seed of sampleUsers()) {
    users.push(await ensureUser(seed));
  }

  const riders = users.filter(user => user.role === UserRole.RIDER);
  const drivers = users.filter(user => user.role === UserRole.DRIVER);

  const now = Date.now();
  const missing = Math.max(0, RIDE_TARGET - await db.rides.count());
  for (let i = 0; i < missing; i++) {
    await seedRide(riders, drivers, now);
  }

  db.flush();
  logger.info('Seed complete', db.getStats());
}

run().catch((error: unknown) => {
  logError('Seed failed', error);
  process.exitCode = 1;
});
