/**
 * =============================================================================
 * RIDE EVENT MODULE - PROJECTIONS
 * =============================================================================
 */

import { RideEventEntity } from '../../shared/database/repository.interface';
import { describeElapsed } from '../../shared/query/time-window';

export interface RideEventView {
  id: string;
  rideId: string;
  description: string;
  createdAt: string;
  isPickupEvent: boolean;
  isDropoffEvent: boolean;
  timeSinceCreated: string;
}

/**
 * Minimal shape embedded in a ride's detail
 */
export interface RecentRideEvent {
  id: string;
  description: string;
  createdAt: string;
}

function mentions(description: string, word: string): boolean {
  return description.toLowerCase().includes(word);
}

export function toRideEventView(event: RideEventEntity, reference: Date): RideEventView {
  return {
    id: event.id,
    rideId: event.rideId,
    description: event.description,
    createdAt: event.createdAt,
    isPickupEvent: mentions(event.description, 'pickup'),
    isDropoffEvent: mentions(event.description, 'dropoff'),
    timeSinceCreated: describeElapsed(event.createdAt, reference)
  };
}

export function toRecentRideEvent(event: RideEventEntity): RecentRideEvent {
  return {
    id: event.id,
    description: event.description,
    createdAt: event.createdAt
  };
}
