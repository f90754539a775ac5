/**
 * =============================================================================
 * VALIDATION UTILITIES - Unit Tests
 * =============================================================================
 */

import { createRideEventSchema, updateRideEventSchema } from '../modules/ride-event/ride-event.schema';
import { createUserSchema } from '../modules/user/user.schema';
import { ValidationError } from '../shared/types/error.types';
import { readPagination, readQueryParams, validateSchema } from '../shared/utils/validation.utils';

describe('Validation Utilities', () => {
  // ===========================================================================
  // validateSchema
  // ===========================================================================

  describe('validateSchema', () => {
    it('should return parsed data with defaults applied', () => {
      const user = validateSchema(createUserSchema, {
        email: '  Grace@Example.com ',
        password: 'test-password',
        passwordConfirm: 'test-password',
        firstName: 'Grace',
        lastName: 'Hopper'
      });

      expect(user).toEqual({
        email: 'grace@example.com',
        password: 'test-password',
        passwordConfirm: 'test-password',
        firstName: 'Grace',
        lastName: 'Hopper',
        phoneNumber: '',
        role: 'rider',
        isStaff: false
      });
    });

    it('should list every failing field', () => {
      expect.assertions(2);
      try {
        validateSchema(createRideEventSchema, { rideId: 'r1', description: '   ' });
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
          message: 'Invalid request data',
          details: { fields: [{ field: 'description', message: 'Description cannot be empty' }] }
        });
      }
    });

    it('should normalize timestamps and reject bad ones', () => {
      expect(validateSchema(updateRideEventSchema, { createdAt: '2024-06-01T14:00:00+02:00' }))
        .toEqual({ createdAt: '2024-06-01T12:00:00.000Z' });
      expect(() => validateSchema(updateRideEventSchema, { createdAt: 'yesterday' })).toThrow(ValidationError);
    });
  });

  // ===========================================================================
  // QUERY STRINGS
  // ===========================================================================

  describe('readQueryParams', () => {
    it('should keep strings and the first of repeated keys', () => {
      expect(readQueryParams({ status: 'completed', driver_id: ['d1', 'd2'], nested: { a: 'b' } }))
        .toEqual({ status: 'completed', driver_id: 'd1' });
    });
  });

  describe('readPagination', () => {
    it('should default page and limit', () => {
      expect(readPagination({})).toEqual({ page: 1, limit: 20 });
      expect(readPagination({ page: '', limit: '' })).toEqual({ page: 1, limit: 20 });
    });

    it('should coerce numeric strings', () => {
      expect(readPagination({ page: '3', limit: '50' })).toEqual({ page: 3, limit: 50 });
    });

    it('should reject out-of-range values', () => {
      expect(() => readPagination({ page: '0' })).toThrow(ValidationError);
      expect(() => readPagination({ limit: '101' })).toThrow(ValidationError);
      expect(() => readPagination({ limit: 'ten' })).toThrow(ValidationError);
    });
  });
});
