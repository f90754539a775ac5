/**
 * =============================================================================
 * USER MODULE - SERVICE
 * =============================================================================
 *
 * User administration: filtered listing, CRUD with soft delete, role lists,
 * a user's rides and aggregate counts.
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import { ErrorCode, ConflictError, NotFoundError } from '../../shared/types/error.types';
import { logger } from '../../shared/services/logger.service';
import { db } from '../../shared/database/db';
import {
  IRideEventRepository,
  IRideRepository,
  IUserRepository,
  UserEntity
} from '../../shared/database/repository.interface';
import {
  buildUserFilters,
  DEFAULT_USER_ORDER,
  parseOrdering,
  participantPredicate,
  USER_ORDERING_FIELDS
} from '../../shared/query/filter-pipeline';
import { Clock, systemClock } from '../../shared/query/time-window';
import { Page, PaginationParams, QueryParams, pageWindow, storePage } from '../../shared/types/api.types';
import { UserRole } from '../../core/constants';
import { loadRideContext, RideListItem, toRideListItem } from '../ride/ride.projection';
import { toUserSummary, toUserView, UserSummary, UserView } from './user.projection';
import { CreateUserInput, UpdateUserInput } from './user.schema';

const BCRYPT_ROUNDS = 10;

export interface UserStats {
  totalUsers: number;
  activeUsers: number;
  inactiveUsers: number;
  drivers: number;
  riders: number;
  admins: number;
  dispatchers: number;
}

export class UserService {
  constructor(
    private readonly users: IUserRepository,
    private readonly rides: IRideRepository,
    private readonly rideEvents: IRideEventRepository,
    private readonly clock: Clock = systemClock
  ) {}

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  async listUsers(params: QueryParams, pagination: PaginationParams): Promise<Page<UserSummary>> {
    const predicates = buildUserFilters(params);
    const order = parseOrdering(params.ordering, USER_ORDERING_FIELDS, DEFAULT_USER_ORDER);

    const [total, rows] = await Promise.all([
      this.users.count(predicates),
      this.users.findMany({ predicates, order, ...pageWindow(pagination) })
    ]);

    return storePage(rows.map(toUserSummary), total, pagination);
  }

  async getUser(userId: string): Promise<UserView> {
    return toUserView(await this.requireUser(userId));
  }

  /**
   * Active users of one role
   */
  async listByRole(role: UserRole): Promise<UserSummary[]> {
    const rows = await this.users.findMany({
      predicates: [
        { kind: 'eq', field: 'role', value: role },
        { kind: 'eq', field: 'isActive', value: true }
      ],
      order: DEFAULT_USER_ORDER
    });
    return rows.map(toUserSummary);
  }

  /**
   * Rides where the user is rider or driver, newest first
   */
  async listUserRides(userId: string, pagination: PaginationParams): Promise<Page<RideListItem>> {
    await this.requireUser(userId);

    const predicates = [participantPredicate(userId)];
    const [total, rows] = await Promise.all([
      this.rides.count(predicates),
      this.rides.findMany({
        predicates,
        order: [{ field: 'createdAt', direction: 'desc' }],
        ...pageWindow(pagination)
      })
    ]);

    const context = await loadRideContext(rows, this.users, this.rideEvents, this.clock());
    return storePage(rows.map(ride => toRideListItem(ride, context)), total, pagination);
  }

  /**
   * Counts over the whole collection; role counts include active users only
   */
  async getStats(): Promise<UserStats> {
    const activeWithRole = (role: UserRole) => this.users.count([
      { kind: 'eq', field: 'role', value: role },
      { kind: 'eq', field: 'isActive', value: true }
    ]);

    const [totalUsers, activeUsers, drivers, riders, admins, dispatchers] = await Promise.all([
      this.users.count(),
      this.users.count([{ kind: 'eq', field: 'isActive', value: true }]),
      activeWithRole(UserRole.DRIVER),
      activeWithRole(UserRole.RIDER),
      activeWithRole(UserRole.ADMIN),
      activeWithRole(UserRole.DISPATCHER)
    ]);

    return {
      totalUsers,
      activeUsers,
      inactiveUsers: totalUsers - activeUsers,
      drivers,
      riders,
      admins,
      dispatchers
    };
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  async createUser(input: CreateUserInput): Promise<UserView> {
    await this.assertEmailAvailable(input.email);

    const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
    const user = await this.users.create({
      role: input.role,
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
      phoneNumber: input.phoneNumber,
      passwordHash,
      isActive: true,
      isStaff: input.isStaff
    });

    logger.info('User created', { userId: user.id, role: user.role });
    return toUserView(user);
  }

  async updateUser(userId: string, input: UpdateUserInput): Promise<UserView> {
    const existing = await this.requireUser(userId);
    if (input.email !== undefined && input.email !== existing.email.toLowerCase()) {
      await this.assertEmailAvailable(input.email);
    }

    const updated = await this.users.update(userId, input);
    if (!updated) {
      throw new NotFoundError('User', ErrorCode.USER_NOT_FOUND);
    }

    logger.info('User updated', { userId, fields: Object.keys(input) });
    return toUserView(updated);
  }

  /**
   * Soft delete: the record stays, the user can no longer authenticate
   */
  async deactivateUser(userId: string): Promise<UserView> {
    return this.setActive(userId, false);
  }

  async activateUser(userId: string): Promise<UserView> {
    return this.setActive(userId, true);
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async setActive(userId: string, isActive: boolean): Promise<UserView> {
    await this.requireUser(userId);
    const updated = await this.users.update(userId, { isActive });
    if (!updated) {
      throw new NotFoundError('User', ErrorCode.USER_NOT_FOUND);
    }

    logger.info(isActive ? 'User activated' : 'User deactivated', { userId });
    return toUserView(updated);
  }

  private async requireUser(userId: string): Promise<UserEntity> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User', ErrorCode.USER_NOT_FOUND);
    }
    return user;
  }

  private async assertEmailAvailable(email: string): Promise<void> {
    if (await this.users.findByEmail(email)) {
      throw new ConflictError('A user with this email already exists', ErrorCode.EMAIL_TAKEN);
    }
  }
}

export const userService = new UserService(db.users, db.rides, db.rideEvents);
