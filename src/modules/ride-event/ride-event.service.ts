/**
 * =============================================================================
 * RIDE EVENT MODULE - SERVICE
 * =============================================================================
 *
 * Event listing, the rolling 24-hour feed, description frequencies and CRUD.
 * Windows are measured from one clock reading per call.
 * =============================================================================
 */

import { config } from '../../config/environment';
import { TODAY_WINDOW_HOURS, WEEK_WINDOW_HOURS } from '../../core/constants';
import { db } from '../../shared/database/db';
import {
  IRideEventRepository,
  IRideRepository,
  RideEventEntity,
  RideEventField
} from '../../shared/database/repository.interface';
import { Predicate } from '../../shared/query/predicate';
import {
  buildEventFilters,
  DEFAULT_EVENT_ORDER,
  EVENT_ORDERING_FIELDS,
  parseOrdering
} from '../../shared/query/filter-pipeline';
import {
  Clock,
  rankByFrequency,
  systemClock,
  windowPredicate,
  withinWindow
} from '../../shared/query/time-window';
import { logger } from '../../shared/services/logger.service';
import { Page, PaginationParams, QueryParams, pageWindow, storePage } from '../../shared/types/api.types';
import { ErrorCode, NotFoundError, ValidationError } from '../../shared/types/error.types';
import { RideEventView, toRideEventView } from './ride-event.projection';
import { CreateRideEventInput, UpdateRideEventInput } from './ride-event.schema';

export interface DescriptionCount {
  description: string;
  count: number;
}

export interface RideEventStats {
  totalEvents: number;
  eventsLast24Hours: number;
  eventsLast7Days: number;
  topDescriptions: DescriptionCount[];
}

export interface RideEventServiceOptions {
  topDescriptionsLimit: number;
}

export class RideEventService {
  constructor(
    private readonly rideEvents: IRideEventRepository,
    private readonly rides: IRideRepository,
    private readonly clock: Clock = systemClock,
    private readonly options: RideEventServiceOptions = { topDescriptionsLimit: config.query.topEventTypesLimit }
  ) {}

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  async listEvents(params: QueryParams, pagination: PaginationParams): Promise<Page<RideEventView>> {
    const predicates = buildEventFilters(params);
    const order = parseOrdering(params.ordering, EVENT_ORDERING_FIELDS, DEFAULT_EVENT_ORDER);
    const reference = this.clock();

    const [total, rows] = await Promise.all([
      this.rideEvents.count(predicates),
      this.rideEvents.findMany({ predicates, order, ...pageWindow(pagination) })
    ]);

    return storePage(rows.map(event => toRideEventView(event, reference)), total, pagination);
  }

  /**
   * Events created in the last 24 hours across all rides, newest first
   */
  async listTodaysEvents(pagination: PaginationParams): Promise<Page<RideEventView>> {
    const reference = this.clock();
    const predicates: Predicate<RideEventField>[] = [windowPredicate('createdAt', reference, TODAY_WINDOW_HOURS)];

    const [total, rows] = await Promise.all([
      this.rideEvents.count(predicates),
      this.rideEvents.findMany({ predicates, order: DEFAULT_EVENT_ORDER, ...pageWindow(pagination) })
    ]);

    return storePage(rows.map(event => toRideEventView(event, reference)), total, pagination);
  }

  /**
   * Every distinct description with its frequency, most frequent first
   */
  async listEventTypes(): Promise<DescriptionCount[]> {
    const events = await this.allEvents();
    return rankByFrequency(events.map(event => event.description))
      .map(entry => ({ description: entry.value, count: entry.count }));
  }

  async getStats(): Promise<RideEventStats> {
    const reference = this.clock();
    const events = await this.allEvents();

    return {
      totalEvents: events.length,
      eventsLast24Hours: withinWindow(reference, TODAY_WINDOW_HOURS, events).length,
      eventsLast7Days: withinWindow(reference, WEEK_WINDOW_HOURS, events).length,
      topDescriptions: rankByFrequency(
        events.map(event => event.description),
        this.options.topDescriptionsLimit
      ).map(entry => ({ description: entry.value, count: entry.count }))
    };
  }

  async getEvent(eventId: string): Promise<RideEventView> {
    return toRideEventView(await this.requireEvent(eventId), this.clock());
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  async createEvent(input: CreateRideEventInput): Promise<RideEventView> {
    const ride = await this.rides.findById(input.rideId);
    if (!ride) {
      throw new ValidationError('Invalid ride reference', {
        fields: [{ field: 'rideId', message: 'Must reference an existing ride' }]
      });
    }

    const event = await this.rideEvents.create({ rideId: input.rideId, description: input.description });
    logger.info('Ride event created', { eventId: event.id, rideId: event.rideId });
    return toRideEventView(event, this.clock());
  }

  async updateEvent(eventId: string, input: UpdateRideEventInput): Promise<RideEventView> {
    await this.requireEvent(eventId);

    const updated = await this.rideEvents.update(eventId, input);
    if (!updated) {
      throw new NotFoundError('Ride event', ErrorCode.RIDE_EVENT_NOT_FOUND);
    }

    logger.info('Ride event updated', { eventId, fields: Object.keys(input) });
    return toRideEventView(updated, this.clock());
  }

  async deleteEvent(eventId: string): Promise<void> {
    const deleted = await this.rideEvents.delete(eventId);
    if (!deleted) {
      throw new NotFoundError('Ride event', ErrorCode.RIDE_EVENT_NOT_FOUND);
    }
    logger.info('Ride event deleted', { eventId });
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private allEvents(): Promise<RideEventEntity[]> {
    return this.rideEvents.findMany({ predicates: [], order: DEFAULT_EVENT_ORDER });
  }

  private async requireEvent(eventId: string): Promise<RideEventEntity> {
    const event = await this.rideEvents.findById(eventId);
    if (!event) {
      throw new NotFoundError('Ride event', ErrorCode.RIDE_EVENT_NOT_FOUND);
    }
    return event;
  }
}

export const rideEventService = new RideEventService(db.rideEvents, db.rides);
