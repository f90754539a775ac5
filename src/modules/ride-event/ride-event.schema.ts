/**
 * =============================================================================
 * RIDE EVENT MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { timestampSchema } from '../../shared/utils/validation.utils';

const descriptionSchema = z.string().trim().min(1, 'Description cannot be empty').max(255);

export const createRideEventSchema = z.object({
  rideId: z.string().trim().min(1),
  description: descriptionSchema
}).strict();

/**
 * Events may be corrected after the fact, including their timestamp
 */
export const updateRideEventSchema = z.object({
  description: descriptionSchema.optional(),
  createdAt: timestampSchema.optional()
}).strict();

export type CreateRideEventInput = z.infer<typeof createRideEventSchema>;
export type UpdateRideEventInput = z.infer<typeof updateRideEventSchema>;
