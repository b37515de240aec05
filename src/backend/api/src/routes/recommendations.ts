/**
 * Recommendation API Endpoint
 *
 * GET /api/v1/recommendations?jobId=&contractorListOnly=
 *
 * Returns the ranked contractor shortlist for a job. The requester is the
 * authenticated dispatcher; contractorListOnly restricts the pool to their
 * personal contractor list.
 */

import { Router, type Response } from 'express';
import { ErrorCodes, RecommendationRequestSchema, type RecommendationResponse } from '@dispatch/shared';
import type { ScoringEngine } from '@dispatch/scoring-service';

import { UserRole, type AuthenticatedRequest } from '../middleware/auth.js';
import { getCorrelationId } from '../middleware/correlation.js';
import { asyncHandler, createErrorResponse } from '../middleware/error-handler.js';
import { requireRole } from '../middleware/rbac.js';

/**
 * Aborts when the client disconnects before the response is written
 */
export function createDisconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function createRecommendationsRouter(engine: ScoringEngine): Router {
  const router = Router();

  router.get(
    '/',
    requireRole(UserRole.DISPATCHER),
    asyncHandler(async (req: AuthenticatedRequest, res: Response): Promise<void> => {
      const user = req.user;
      if (!user) {
        res
          .status(401)
          .json(
            createErrorResponse(ErrorCodes.UNAUTHORIZED, 'Authentication required', getCorrelationId(req))
          );
        return;
      }

      const request = RecommendationRequestSchema.parse(req.query);

      const response: RecommendationResponse = await engine.getRecommendations(
        request.jobId,
        user.userId,
        request.contractorListOnly,
        { signal: createDisconnectSignal(res), correlationId: getCorrelationId(req) }
      );

      res.status(200).json(response);
    })
  );

  return router;
}
