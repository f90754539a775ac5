/**
 * =============================================================================
 * USER MODULE - ROUTES
 * =============================================================================
 *
 * User administration. Every route is admin-only, reads included.
 * =============================================================================
 */

import { Router } from 'express';
import { userController } from './user.controller';
import { authenticate, accessGate } from '../../shared/middleware/auth.middleware';
import { AccessPolicy } from '../../shared/security/access-gate';

const router = Router();

router.use(authenticate, accessGate(AccessPolicy.ADMIN_ONLY));

/**
 * @route   GET /api/v1/users
 * @desc    List users (role, is_active, start_date, end_date, search, ordering, page, limit)
 * @access  Private (Admin)
 */
router.get('/', userController.listUsers);

/**
 * @route   GET /api/v1/users/stats
 * @desc    User counts (role counts over active users)
 * @access  Private (Admin)
 */
router.get('/stats', userController.getStats);

/**
 * @route   GET /api/v1/users/drivers
 * @desc    Active drivers
 * @access  Private (Admin)
 */
router.get('/drivers', userController.listDrivers);

/**
 * @route   GET /api/v1/users/riders
 * @desc    Active riders
 * @access  Private (Admin)
 */
router.get('/riders', userController.listRiders);

/**
 * @route   GET /api/v1/users/:id
 * @access  Private (Admin)
 */
router.get('/:id', userController.getUser);

/**
 * @route   POST /api/v1/users
 * @desc    Create a user (password hashed with bcrypt)
 * @access  Private (Admin)
 */
router.post('/', userController.createUser);

/**
 * @route   PATCH /api/v1/users/:id
 * @access  Private (Admin)
 */
router.patch('/:id', userController.updateUser);

/**
 * @route   DELETE /api/v1/users/:id
 * @desc    Soft delete (deactivate)
 * @access  Private (Admin)
 */
router.delete('/:id', userController.deactivateUser);

/**
 * @route   POST /api/v1/users/:id/activate
 * @access  Private (Admin)
 */
router.post('/:id/activate', userController.activateUser);

/**
 * @route   GET /api/v1/users/:id/rides
 * @desc    Rides where the user is rider or driver, newest first
 * @access  Private (Admin)
 */
router.get('/:id/rides', userController.listUserRides);

export { router as userRouter };
