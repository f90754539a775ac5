/**
 * =============================================================================
 * AUTH MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * GET /auth/check-role   - Caller identity and role
 * GET /auth/test-admin   - Succeeds only for admins
 * =============================================================================
 */

import { Router } from 'express';
import { authController } from './auth.controller';
import { authenticate, accessGate } from '../../shared/middleware/auth.middleware';
import { AccessPolicy } from '../../shared/security/access-gate';

const router = Router();

/**
 * @route   GET /api/v1/auth/check-role
 * @access  Private
 */
router.get('/check-role', authenticate, accessGate(AccessPolicy.AUTHENTICATED), authController.checkRole);

/**
 * @route   GET /api/v1/auth/test-admin
 * @access  Private (Admin)
 */
router.get('/test-admin', authenticate, accessGate(AccessPolicy.ADMIN_ONLY), authController.testAdmin);

export { router as authRouter };
