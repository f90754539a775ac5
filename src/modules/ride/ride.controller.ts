/**
 * =============================================================================
 * RIDE MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { rideService, RideService } from './ride.service';
import { createRideSchema, updateRideSchema } from './ride.schema';
import { readPagination, readQueryParams, validateSchema } from '../../shared/utils/validation.utils';
import { pageMeta, successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

export class RideController {
  constructor(private readonly service: RideService) {}

  listRides = asyncHandler(async (req: Request, res: Response) => {
    const params = readQueryParams(req.query);
    const page = await this.service.listRides(params, readPagination(params));
    res.json(successResponse(page.items, pageMeta(page)));
  });

  getStats = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await this.service.getStats()));
  });

  listActiveRides = asyncHandler(async (req: Request, res: Response) => {
    const params = readQueryParams(req.query);
    const page = await this.service.listActiveRides(params, readPagination(params));
    res.json(successResponse(page.items, pageMeta(page)));
  });

  nearbyRides = asyncHandler(async (req: Request, res: Response) => {
    res.json(successResponse(await this.service.nearbyRides(readQueryParams(req.query))));
  });

  getRide = asyncHandler(async (req: Request, res: Response) => {
    res.json(successResponse(await this.service.getRide(req.params.id, readQueryParams(req.query))));
  });

  listRideEvents = asyncHandler(async (req: Request, res: Response) => {
    res.json(successResponse(await this.service.listRideEvents(req.params.id)));
  });

  createRide = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createRideSchema, req.body);
    res.status(201).json(successResponse(await this.service.createRide(data)));
  });

  updateRide = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(updateRideSchema, req.body);
    res.json(successResponse(await this.service.updateRide(req.params.id, data)));
  });

  deleteRide = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.service.deleteRide(req.params.id);
    res.json(successResponse({ id: req.params.id, ...result }));
  });
}

export const rideController = new RideController(rideService);
