/**
 * Role-Based Access Control (RBAC) Middleware
 *
 * Recommendation and slot endpoints are limited to dispatchers.
 */

import type { NextFunction, Response } from 'express';
import { ErrorCodes } from '@dispatch/shared';

import type { AuthenticatedRequest, UserRole } from './auth.js';
import { getCorrelationId } from './correlation.js';
import { createErrorResponse } from './error-handler.js';

export function hasAnyRole(userRoles: readonly UserRole[], required: readonly UserRole[]): boolean {
  return userRoles.some((role) => required.includes(role));
}

/**
 * Requires the authenticated user to hold at least one of the roles
 */
export function requireRole(...roles: UserRole[]) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res
        .status(401)
        .json(
          createErrorResponse(ErrorCodes.UNAUTHORIZED, 'Authentication required', getCorrelationId(req))
        );
      return;
    }

    if (!hasAnyRole(req.user.roles, roles)) {
      res.status(403).json(
        createErrorResponse(
          ErrorCodes.FORBIDDEN,
          `This action requires one of the following roles: ${roles.join(', ')}`,
          getCorrelationId(req),
          { requiredRole: roles.join(' or '), userRoles: req.user.roles }
        )
      );
      return;
    }

    next();
  };
}
