/**
 * =============================================================================
 * RIDE EVENT MODULE - ROUTES
 * =============================================================================
 *
 * Any authenticated caller may read events; only admins write them.
 * =============================================================================
 */

import { Router } from 'express';
import { rideEventController } from './ride-event.controller';
import { authenticate, accessGate } from '../../shared/middleware/auth.middleware';
import { AccessPolicy } from '../../shared/security/access-gate';

const router = Router();

router.use(authenticate, accessGate(AccessPolicy.ADMIN_WRITE_READ_ANY));

/**
 * @route   GET /api/v1/ride-events
 * @desc    List events (ride_id, event_type, start_date, end_date, search, ordering)
 * @access  Private
 */
router.get('/', rideEventController.listEvents);

/**
 * @route   GET /api/v1/ride-events/today
 * @desc    Events of the last 24 hours, newest first
 * @access  Private
 */
router.get('/today', rideEventController.listTodaysEvents);

/**
 * @route   GET /api/v1/ride-events/types
 * @desc    Distinct descriptions with their counts
 * @access  Private
 */
router.get('/types', rideEventController.listEventTypes);

/**
 * @route   GET /api/v1/ride-events/stats
 * @access  Private
 */
router.get('/stats', rideEventController.getStats);

/**
 * @route   GET /api/v1/ride-events/:id
 * @access  Private
 */
router.get('/:id', rideEventController.getEvent);

/**
 * @route   POST /api/v1/ride-events
 * @access  Private (Admin)
 */
router.post('/', rideEventController.createEvent);

/**
 * @route   PATCH /api/v1/ride-events/:id
 * @access  Private (Admin)
 */
router.patch('/:id', rideEventController.updateEvent);

/**
 * @route   DELETE /api/v1/ride-events/:id
 * @access  Private (Admin)
 */
router.delete('/:id', rideEventController.deleteEvent);

export { router as rideEventRouter };
