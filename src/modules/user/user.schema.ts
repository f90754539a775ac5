/**
 * =============================================================================
 * USER MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { UserRole } from '../../core/constants';

const nameSchema = z.string().trim().min(1).max(150);
const emailSchema = z.string().trim().toLowerCase().email();
const phoneNumberSchema = z.string().trim().max(20).regex(/^[+\d\s()-]*$/, 'Invalid phone number');

/**
 * Create user request schema
 */
export const createUserSchema = z.object({
  email: emailSchema,
  password: z.string().min(8, 'Password must be at least 8 characters'),
  passwordConfirm: z.string(),
  firstName: nameSchema,
  lastName: nameSchema,
  phoneNumber: phoneNumberSchema.default(''),
  role: z.nativeEnum(UserRole).default(UserRole.RIDER),
  isStaff: z.boolean().default(false)
}).strict().refine(data => data.password === data.passwordConfirm, {
  message: 'Passwords do not match',
  path: ['passwordConfirm']
});

/**
 * Partial update; password changes are not handled here
 */
export const updateUserSchema = z.object({
  email: emailSchema.optional(),
  firstName: nameSchema.optional(),
  lastName: nameSchema.optional(),
  phoneNumber: phoneNumberSchema.optional(),
  role: z.nativeEnum(UserRole).optional(),
  isActive: z.boolean().optional(),
  isStaff: z.boolean().optional()
}).strict();

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
