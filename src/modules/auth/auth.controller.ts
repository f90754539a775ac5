/**
 * =============================================================================
 * AUTH MODULE - CONTROLLER
 * =============================================================================
 *
 * Diagnostics for an already-issued credential. Tokens are issued elsewhere.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { userService, UserService } from '../user/user.service';
import { requireCaller } from '../../shared/middleware/auth.middleware';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

export class AuthController {
  constructor(private readonly users: UserService) {}

  /**
   * Who the token belongs to and whether they are an admin
   */
  checkRole = asyncHandler(async (req: Request, res: Response) => {
    const user = await this.users.getUser(requireCaller(req).userId);
    res.json(successResponse({
      authenticated: true,
      user: {
        email: user.email,
        role: user.role,
        isAdmin: user.isAdmin,
        fullName: user.fullName
      }
    }));
  });

  testAdmin = asyncHandler(async (req: Request, res: Response) => {
    const user = await this.users.getUser(requireCaller(req).userId);
    res.json(successResponse({
      message: 'Admin access confirmed',
      user: {
        email: user.email,
        role: user.role,
        fullName: user.fullName
      }
    }));
  });
}

export const authController = new AuthController(userService);
