/**
 * =============================================================================
 * RIDE MODULE - ROUTES
 * =============================================================================
 *
 * Ride queries (filters, GPS ranking, radius search) and CRUD.
 * Admin-only for reads and writes.
 * =============================================================================
 */

import { Router } from 'express';
import { rideController } from './ride.controller';
import { authenticate, accessGate } from '../../shared/middleware/auth.middleware';
import { AccessPolicy } from '../../shared/security/access-gate';

const router = Router();

router.use(authenticate, accessGate(AccessPolicy.ADMIN_ONLY));

/**
 * @route   GET /api/v1/rides
 * @desc    List rides. Filters: status, rider_id, driver_id, start_date,
 *          end_date, search, ordering. gps_latitude + gps_longitude sort by
 *          distance to pickup instead of ordering.
 * @access  Private (Admin)
 */
router.get('/', rideController.listRides);

/**
 * @route   GET /api/v1/rides/stats
 * @access  Private (Admin)
 */
router.get('/stats', rideController.getStats);

/**
 * @route   GET /api/v1/rides/active
 * @desc    Rides en-route, at pickup or at dropoff
 * @access  Private (Admin)
 */
router.get('/active', rideController.listActiveRides);

/**
 * @route   GET /api/v1/rides/nearby
 * @desc    Rides with pickup within radius km (default 10) of the GPS point
 * @access  Private (Admin)
 */
router.get('/nearby', rideController.nearbyRides);

/**
 * @route   GET /api/v1/rides/:id
 * @desc    Ride detail with today's events
 * @access  Private (Admin)
 */
router.get('/:id', rideController.getRide);

/**
 * @route   GET /api/v1/rides/:id/events
 * @access  Private (Admin)
 */
router.get('/:id/events', rideController.listRideEvents);

/**
 * @route   POST /api/v1/rides
 * @access  Private (Admin)
 */
router.post('/', rideController.createRide);

/**
 * @route   PATCH /api/v1/rides/:id
 * @desc    Update a ride; a status change also records a ride event
 * @access  Private (Admin)
 */
router.patch('/:id', rideController.updateRide);

/**
 * @route   DELETE /api/v1/rides/:id
 * @desc    Delete a ride and its events
 * @access  Private (Admin)
 */
router.delete('/:id', rideController.deleteRide);

export { router as rideRouter };
