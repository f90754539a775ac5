/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * Contract between the query engine and whatever stores the records.
 * Implementations:
 *   - DatabaseService (db.ts): in-process store, optional JSON file persistence
 *   - any SQL/NoSQL store able to evaluate the predicate list below
 *
 * A query is an explicit QueryPlan built once per request: a predicate list
 * (AND-combined), an ordering and an optional window. Nothing is deferred.
 * =============================================================================
 */

import { RideStatus, UserRole } from '../../core/constants';
import { QueryPlan, Predicate } from '../query/predicate';

/**
 * Base entity interface - all records have these fields
 */
export interface BaseEntity {
  id: string;
  createdAt: string;
}

export interface UserEntity extends BaseEntity {
  role: UserRole;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  passwordHash: string;
  isActive: boolean;
  isStaff: boolean;
  updatedAt: string;
}

export interface RideEntity extends BaseEntity {
  status: RideStatus;
  riderId: string;
  driverId: string;
  pickupLatitude: number;
  pickupLongitude: number;
  dropoffLatitude: number;
  dropoffLongitude: number;
  pickupTime: string;
  updatedAt: string;
}

export interface RideEventEntity extends BaseEntity {
  rideId: string;
  description: string;
}

// =============================================================================
// QUERYABLE FIELDS
// =============================================================================

type PersonField = 'firstName' | 'lastName' | 'email';

export type UserField = Exclude<keyof UserEntity, 'passwordHash'>;

/**
 * Ride fields, plus the rider's and driver's name/email reached through the
 * two user references.
 */
export type RideField =
  | keyof RideEntity
  | `rider.${PersonField}`
  | `driver.${PersonField}`;

export type RideEventField = keyof RideEventEntity;

// =============================================================================
// REPOSITORY
// =============================================================================

/**
 * Fields set by the store on insert. createdAt defaults to the insert time
 * but may be supplied (imports, seeding).
 */
export type StoreManaged = 'id' | 'createdAt' | 'updatedAt';

export type CreateInput<T extends BaseEntity> = Omit<T, StoreManaged> & { createdAt?: string };

/**
 * createdAt stays writable: ride events can be back-dated through update_event
 */
export type UpdateInput<T extends BaseEntity> = Partial<Omit<T, 'id' | 'updatedAt'>>;

/**
 * Generic Repository Interface
 */
export interface IRepository<T extends BaseEntity, F extends string> {
  findById(id: string): Promise<T | null>;

  /**
   * Rows matching every predicate, ordered and windowed per the plan
   */
  findMany(plan: QueryPlan<F>): Promise<T[]>;

  count(predicates?: readonly Predicate<F>[]): Promise<number>;

  create(data: CreateInput<T>): Promise<T>;

  /**
   * Patch a record; returns null when the id is unknown
   */
  update(id: string, data: UpdateInput<T>): Promise<T | null>;

  /**
   * Hard delete; returns false when the id is unknown
   */
  delete(id: string): Promise<boolean>;
}

export interface IUserRepository extends IRepository<UserEntity, UserField> {
  findByEmail(email: string): Promise<UserEntity | null>;
  findByIds(ids: readonly string[]): Promise<UserEntity[]>;
}

export type IRideRepository = IRepository<RideEntity, RideField>;

export interface IRideEventRepository extends IRepository<RideEventEntity, RideEventField> {
  deleteByRide(rideId: string): Promise<number>;
}
