/**
 * =============================================================================
 * USER MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { userService, UserService } from './user.service';
import { createUserSchema, updateUserSchema } from './user.schema';
import { readPagination, readQueryParams, validateSchema } from '../../shared/utils/validation.utils';
import { pageMeta, successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { UserRole } from '../../core/constants';

export class UserController {
  constructor(private readonly service: UserService) {}

  listUsers = asyncHandler(async (req: Request, res: Response) => {
    const params = readQueryParams(req.query);
    const page = await this.service.listUsers(params, readPagination(params));
    res.json(successResponse(page.items, pageMeta(page)));
  });

  getStats = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await this.service.getStats()));
  });

  listDrivers = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await this.service.listByRole(UserRole.DRIVER)));
  });

  listRiders = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await this.service.listByRole(UserRole.RIDER)));
  });

  getUser = asyncHandler(async (req: Request, res: Response) => {
    res.json(successResponse(await this.service.getUser(req.params.id)));
  });

  createUser = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createUserSchema, req.body);
    const user = await this.service.createUser(data);
    res.status(201).json(successResponse(user));
  });

  updateUser = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(updateUserSchema, req.body);
    res.json(successResponse(await this.service.updateUser(req.params.id, data)));
  });

  deactivateUser = asyncHandler(async (req: Request, res: Response) => {
    const user = await this.service.deactivateUser(req.params.id);
    res.json(successResponse({ message: `User ${user.email} has been deactivated`, user }));
  });

  activateUser = asyncHandler(async (req: Request, res: Response) => {
    const user = await this.service.activateUser(req.params.id);
    res.json(successResponse({ message: `User ${user.email} has been activated`, user }));
  });

  listUserRides = asyncHandler(async (req: Request, res: Response) => {
    const params = readQueryParams(req.query);
    const page = await this.service.listUserRides(req.params.id, readPagination(params));
    res.json(successResponse(page.items, pageMeta(page)));
  });
}

export const userController = new UserController(userService);
