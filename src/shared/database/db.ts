/**
 * =============================================================================
 * DATABASE SERVICE - In-process store with JSON file persistence
 * =============================================================================
 *
 * Implements the repository contract for users, rides and ride events.
 * Records live in memory; when persistence is enabled every write schedules
 * a debounced save of the whole snapshot to a JSON file, which is loaded
 * again on start.
 *
 * Writes are single-record; deleteByRide is the only bulk write.
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { config } from '../../config/environment';
import { RideStatus, UserRole } from '../../core/constants';
import { logger, logError } from '../services/logger.service';
import { ConflictError, ErrorCode } from '../types/error.types';
import { compareByOrder, matchesAll, Predicate, QueryPlan } from '../query/predicate';
import {
  BaseEntity,
  CreateInput,
  IRepository,
  IRideEventRepository,
  IRideRepository,
  IUserRepository,
  RideEntity,
  RideEventEntity,
  RideEventField,
  RideField,
  UpdateInput,
  UserEntity,
  UserField
} from './repository.interface';

const SNAPSHOT_VERSION = '1.0.0';

const userRecordSchema = z.object({
  id: z.string(),
  role: z.nativeEnum(UserRole),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  phoneNumber: z.string(),
  passwordHash: z.string(),
  isActive: z.boolean(),
  isStaff: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string()
});

const rideRecordSchema = z.object({
  id: z.string(),
  status: z.nativeEnum(RideStatus),
  riderId: z.string(),
  driverId: z.string(),
  pickupLatitude: z.number(),
  pickupLongitude: z.number(),
  dropoffLatitude: z.number(),
  dropoffLongitude: z.number(),
  pickupTime: z.string(),
  createdAt: z.string(),
  updatedAt: z.string()
});

const rideEventRecordSchema = z.object({
  id: z.string(),
  rideId: z.string(),
  description: z.string(),
  createdAt: z.string()
});

const snapshotSchema = z.object({
  users: z.array(userRecordSchema),
  rides: z.array(rideRecordSchema),
  rideEvents: z.array(rideEventRecordSchema),
  _meta: z.object({
    version: z.string(),
    lastUpdated: z.string()
  })
});

export type DatabaseSnapshot = z.infer<typeof snapshotSchema>;

function emptySnapshot(): DatabaseSnapshot {
  return {
    users: [],
    rides: [],
    rideEvents: [],
    _meta: { version: SNAPSHOT_VERSION, lastUpdated: new Date().toISOString() }
  };
}

// =============================================================================
// REPOSITORIES
// =============================================================================

/**
 * Shared query/write logic over one in-memory table
 */
abstract class InMemoryRepository<T extends BaseEntity, F extends string> implements IRepository<T, F> {
  constructor(
    protected readonly rows: T[],
    protected readonly onChange: () => void,
    protected readonly now: () => Date
  ) {}

  protected abstract readField(row: T, field: F): unknown;

  protected abstract build(data: CreateInput<T>, id: string, timestamp: string): T;

  /** Stamp a patched row (updatedAt where the entity has one) */
  protected abstract touch(row: T, timestamp: string): T;

  /**
   * Table constraints, checked against the other rows right before a row is
   * stored. Runs synchronously with the write, so no other write interleaves.
   */
  protected checkConstraints(_row: T): void {}

  private readonly reader = (row: T, field: F): unknown => this.readField(row, field);

  async findById(id: string): Promise<T | null> {
    const row = this.rows.find(candidate => candidate.id === id);
    return row ? { ...row } : null;
  }

  async findMany(plan: QueryPlan<F>): Promise<T[]> {
    const matched = this.rows
      .filter(row => matchesAll(row, plan.predicates, this.reader))
      .sort(compareByOrder(plan.order, this.reader));

    const offset = plan.offset ?? 0;
    const windowed = plan.limit === undefined
      ? matched.slice(offset)
      : matched.slice(offset, offset + plan.limit);

    return windowed.map(row => ({ ...row }));
  }

  async count(predicates: readonly Predicate<F>[] = []): Promise<number> {
    return this.rows.filter(row => matchesAll(row, predicates, this.reader)).length;
  }

  async create(data: CreateInput<T>): Promise<T> {
    const record = this.build(data, uuidv4(), this.now().toISOString());
    this.checkConstraints(record);
    this.rows.push(record);
    this.onChange();
    return { ...record };
  }

  async update(id: string, data: UpdateInput<T>): Promise<T | null> {
    const index = this.rows.findIndex(row => row.id === id);
    if (index < 0) return null;

    const patched = this.touch({ ...this.rows[index], ...data }, this.now().toISOString());
    this.checkConstraints(patched);
    this.rows[index] = patched;
    this.onChange();
    return { ...this.rows[index] };
  }

  async delete(id: string): Promise<boolean> {
    const index = this.rows.findIndex(row => row.id === id);
    if (index < 0) return false;

    this.rows.splice(index, 1);
    this.onChange();
    return true;
  }
}

class UserRepository extends InMemoryRepository<UserEntity, UserField> implements IUserRepository {
  protected readField(row: UserEntity, field: UserField): unknown {
    return row[field];
  }

  protected build(data: CreateInput<UserEntity>, id: string, timestamp: string): UserEntity {
    return { ...data, id, createdAt: data.createdAt ?? timestamp, updatedAt: timestamp };
  }

  protected touch(row: UserEntity, timestamp: string): UserEntity {
    return { ...row, updatedAt: timestamp };
  }

  /** email is unique, case-insensitive */
  protected checkConstraints(row: UserEntity): void {
    const email = row.email.trim().toLowerCase();
    if (this.rows.some(other => other.id !== row.id && other.email.toLowerCase() === email)) {
      throw new ConflictError('A user with this email already exists', ErrorCode.EMAIL_TAKEN);
    }
  }

  async findByEmail(email: string): Promise<UserEntity | null> {
    const needle = email.trim().toLowerCase();
    const user = this.rows.find(row => row.email.toLowerCase() === needle);
    return user ? { ...user } : null;
  }

  async findByIds(ids: readonly string[]): Promise<UserEntity[]> {
    return this.rows.filter(row => ids.includes(row.id)).map(row => ({ ...row }));
  }
}

class RideRepository extends InMemoryRepository<RideEntity, RideField> implements IRideRepository {
  constructor(
    rows: RideEntity[],
    private readonly users: readonly UserEntity[],
    onChange: () => void,
    now: () => Date
  ) {
    super(rows, onChange, now);
  }

  protected readField(row: RideEntity, field: RideField): unknown {
    switch (field) {
      case 'rider.firstName':
        return this.userById(row.riderId)?.firstName;
      case 'rider.lastName':
        return this.userById(row.riderId)?.lastName;
      case 'rider.email':
        return this.userById(row.riderId)?.email;
      case 'driver.firstName':
        return this.userById(row.driverId)?.firstName;
      case 'driver.lastName':
        return this.userById(row.driverId)?.lastName;
      case 'driver.email':
        return this.userById(row.driverId)?.email;
      default:
        return row[field];
    }
  }

  private userById(id: string): UserEntity | undefined {
    return this.users.find(user => user.id === id);
  }

  protected build(data: CreateInput<RideEntity>, id: string, timestamp: string): RideEntity {
    return { ...data, id, createdAt: data.createdAt ?? timestamp, updatedAt: timestamp };
  }

  protected touch(row: RideEntity, timestamp: string): RideEntity {
    return { ...row, updatedAt: timestamp };
  }
}

class RideEventRepository extends InMemoryRepository<RideEventEntity, RideEventField> implements IRideEventRepository {
  protected readField(row: RideEventEntity, field: RideEventField): unknown {
    return row[field];
  }

  protected build(data: CreateInput<RideEventEntity>, id: string, timestamp: string): RideEventEntity {
    return { ...data, id, createdAt: data.createdAt ?? timestamp };
  }

  protected touch(row: RideEventEntity): RideEventEntity {
    return row;
  }

  async deleteByRide(rideId: string): Promise<number> {
    let removed = 0;
    for (let index = this.rows.length - 1; index >= 0; index--) {
      if (this.rows[index].rideId === rideId) {
        this.rows.splice(index, 1);
        removed++;
      }
    }
    if (removed > 0) this.onChange();
    return removed;
  }
}

// =============================================================================
// DATABASE SERVICE
// =============================================================================

export interface DatabaseOptions {
  /** JSON snapshot location; required when persist is true */
  filePath?: string;
  persist: boolean;
  now?: () => Date;
}

export class DatabaseService {
  readonly users: IUserRepository;
  readonly rides: IRideRepository;
  readonly rideEvents: IRideEventRepository;

  private readonly data: DatabaseSnapshot;
  private saveTimeout: NodeJS.Timeout | null = null;

  constructor(private readonly options: DatabaseOptions) {
    this.data = options.persist ? this.load() : emptySnapshot();

    const now = options.now ?? (() => new Date());
    const onChange = () => this.save();

    this.users = new UserRepository(this.data.users, onChange, now);
    this.rides = new RideRepository(this.data.rides, this.data.users, onChange, now);
    this.rideEvents = new RideEventRepository(this.data.rideEvents, onChange, now);
  }

  private load(): DatabaseSnapshot {
    const file = this.requireFilePath();
    try {
      if (!fs.existsSync(file)) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        const fresh = emptySnapshot();
        this.writeSnapshot(fresh);
        logger.info(`Created database file ${file}`);
        return fresh;
      }

      const parsed = snapshotSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
      if (!parsed.success) {
        logger.error('Database file failed validation, starting empty', {
          file,
          issues: parsed.error.errors.slice(0, 5).map(issue => `${issue.path.join('.')}: ${issue.message}`)
        });
        return emptySnapshot();
      }

      logger.info(`Database loaded from ${file}`, {
        users: parsed.data.users.length,
        rides: parsed.data.rides.length,
        rideEvents: parsed.data.rideEvents.length
      });
      return parsed.data;
    } catch (error) {
      logError('Failed to load database, starting empty', error);
      return emptySnapshot();
    }
  }

  /**
   * Debounced save
   */
  private save(): void {
    if (!this.options.persist) return;
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.writeSnapshot(this.data);
    }, 100);
  }

  /**
   * Write any pending changes now (shutdown, scripts)
   */
  flush(): void {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (this.options.persist) {
      this.writeSnapshot(this.data);
    }
  }

  private writeSnapshot(snapshot: DatabaseSnapshot): void {
    const file = this.requireFilePath();
    try {
      snapshot._meta.lastUpdated = new Date().toISOString();
      fs.writeFileSync(file, JSON.stringify(snapshot, null, 2));
    } catch (error) {
      logError('Failed to save database', error);
    }
  }

  private requireFilePath(): string {
    if (!this.options.filePath) {
      throw new Error('DatabaseService: filePath is required when persist is enabled');
    }
    return this.options.filePath;
  }

  getStats() {
    return {
      users: this.data.users.length,
      activeUsers: this.data.users.filter(user => user.isActive).length,
      rides: this.data.rides.length,
      rideEvents: this.data.rideEvents.length,
      persisted: this.options.persist,
      ...(this.options.persist ? { dbPath: this.options.filePath } : {})
    };
  }
}

// Export singleton instance
export const db = new DatabaseService({
  filePath: config.database.file,
  persist: config.database.persist
});
