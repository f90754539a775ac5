/**
 * =============================================================================
 * RIDE MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { RideStatus } from '../../core/constants';
import { latitudeSchema, longitudeSchema, timestampSchema } from '../../shared/utils/validation.utils';

const userIdSchema = z.string().trim().min(1);

/**
 * Create ride request schema
 */
export const createRideSchema = z.object({
  status: z.nativeEnum(RideStatus).default(RideStatus.EN_ROUTE),
  riderId: userIdSchema,
  driverId: userIdSchema,
  pickupLatitude: latitudeSchema,
  pickupLongitude: longitudeSchema,
  dropoffLatitude: latitudeSchema,
  dropoffLongitude: longitudeSchema,
  pickupTime: timestampSchema
}).strict().refine(data => data.riderId !== data.driverId, {
  message: 'Rider and driver must be different users',
  path: ['driverId']
});

/**
 * Partial update. Any status may follow any other.
 */
export const updateRideSchema = z.object({
  status: z.nativeEnum(RideStatus).optional(),
  riderId: userIdSchema.optional(),
  driverId: userIdSchema.optional(),
  pickupLatitude: latitudeSchema.optional(),
  pickupLongitude: longitudeSchema.optional(),
  dropoffLatitude: latitudeSchema.optional(),
  dropoffLongitude: longitudeSchema.optional(),
  pickupTime: timestampSchema.optional()
}).strict();

export type CreateRideInput = z.infer<typeof createRideSchema>;
export type UpdateRideInput = z.infer<typeof updateRideSchema>;
