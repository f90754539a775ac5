/**
 * =============================================================================
 * RIDE EVENT MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { rideEventService, RideEventService } from './ride-event.service';
import { createRideEventSchema, updateRideEventSchema } from './ride-event.schema';
import { readPagination, readQueryParams, validateSchema } from '../../shared/utils/validation.utils';
import { pageMeta, successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

export class RideEventController {
  constructor(private readonly service: RideEventService) {}

  listEvents = asyncHandler(async (req: Request, res: Response) => {
    const params = readQueryParams(req.query);
    const page = await this.service.listEvents(params, readPagination(params));
    res.json(successResponse(page.items, pageMeta(page)));
  });

  listTodaysEvents = asyncHandler(async (req: Request, res: Response) => {
    const page = await this.service.listTodaysEvents(readPagination(readQueryParams(req.query)));
    res.json(successResponse(page.items, pageMeta(page)));
  });

  listEventTypes = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await this.service.listEventTypes()));
  });

  getStats = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await this.service.getStats()));
  });

  getEvent = asyncHandler(async (req: Request, res: Response) => {
    res.json(successResponse(await this.service.getEvent(req.params.id)));
  });

  createEvent = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createRideEventSchema, req.body);
    res.status(201).json(successResponse(await this.service.createEvent(data)));
  });

  updateEvent = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(updateRideEventSchema, req.body);
    res.json(successResponse(await this.service.updateEvent(req.params.id, data)));
  });

  deleteEvent = asyncHandler(async (req: Request, res: Response) => {
    await this.service.deleteEvent(req.params.id);
    res.json(successResponse({ id: req.params.id }));
  });
}

export const rideEventController = new RideEventController(rideEventService);
