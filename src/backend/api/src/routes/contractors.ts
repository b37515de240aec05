/**
 * Contractor Schedule Endpoints
 *
 * GET /api/v1/contractors/:contractorId/slots?date=YYYY-MM-DD
 * GET /api/v1/contractors/:contractorId/availability?start=&durationHours=&travelTimeMinutes=
 */

import { Router, type Request, type Response } from 'express';
import {
  AvailabilityCheckRequestSchema,
  AvailableSlotsRequestSchema,
} from '@dispatch/shared';
import {
  parseUtcDate,
  type AvailabilityEvaluator,
  type ScoringEngine,
} from '@dispatch/scoring-service';

import { UserRole } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { requireRole } from '../middleware/rbac.js';

export function createContractorsRouter(
  engine: ScoringEngine,
  availability: AvailabilityEvaluator
): Router {
  const router = Router();

  router.use(requireRole(UserRole.DISPATCHER));

  router.get(
    '/:contractorId/slots',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const request = AvailableSlotsRequestSchema.parse({
        contractorId: req.params.contractorId,
        date: req.query.date,
      });

      const availableSlots = await engine.getAvailableTimeSlots(
        request.contractorId,
        parseUtcDate(request.date)
      );

      res.status(200).json({
        contractorId: request.contractorId,
        date: request.date,
        availableSlots,
      });
    })
  );

  router.get(
    '/:contractorId/availability',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const request = AvailabilityCheckRequestSchema.parse({
        contractorId: req.params.contractorId,
        start: req.query.start,
        durationHours: req.query.durationHours,
        travelTimeMinutes: req.query.travelTimeMinutes,
      });

      const available = await availability.checkContractorAvailability(
        request.contractorId,
        request.start,
        request.durationHours,
        request.travelTimeMinutes
      );

      res.status(200).json({
        contractorId: request.contractorId,
        start: request.start,
        durationHours: request.durationHours,
        available,
      });
    })
  );

  return router;
}
