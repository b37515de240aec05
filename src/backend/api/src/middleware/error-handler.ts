/**
 * Error Handling Middleware
 *
 * Maps domain errors and zod validation failures to JSON error responses.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import {
  ErrorCodes,
  getLogger,
  isDomainError,
  toError,
  type Logger,
  type MetricsCollector,
} from '@dispatch/shared';

import { getCorrelationId } from './correlation.js';

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

/**
 * API Error response format
 */
export interface ApiErrorResponse {
  error: string;
  message: string;
  correlationId?: string;
  details?: FieldError[] | Record<string, unknown>;
}

/**
 * Formats Zod validation errors into field-level error details
 */
export function formatValidationErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

export function createErrorResponse(
  error: string,
  message: string,
  correlationId?: string,
  details?: FieldError[] | Record<string, unknown>
): ApiErrorResponse {
  return { error, message, correlationId, details };
}

/**
 * Forwards rejections of an async handler to the error middleware
 */
export function asyncHandler<Req extends Request>(
  handler: (req: Req, res: Response, next: NextFunction) => Promise<void>
): (req: Req, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    res
      .status(404)
      .json(
        createErrorResponse(
          ErrorCodes.NOT_FOUND,
          'The requested resource was not found',
          getCorrelationId(req)
        )
      );
  };
}

export function errorHandler(logger: Logger = getLogger(), metrics?: MetricsCollector) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const correlationId = getCorrelationId(req);

    if (err instanceof ZodError) {
      res
        .status(400)
        .json(
          createErrorResponse(
            ErrorCodes.VALIDATION_ERROR,
            'Request validation failed',
            correlationId,
            formatValidationErrors(err)
          )
        );
      return;
    }

    if (isDomainError(err)) {
      if (err.statusCode >= 500) {
        logger.warn('Request failed', { correlationId, code: err.code, path: req.path }, err);
        metrics?.recordRequestError({ code: err.code });
      }
      res
        .status(err.statusCode)
        .json(createErrorResponse(err.code, err.message, correlationId, err.details));
      return;
    }

    logger.error('Unhandled error', toError(err), { correlationId, path: req.path });
    metrics?.recordRequestError({ code: ErrorCodes.INTERNAL_ERROR });
    res
      .status(500)
      .json(
        createErrorResponse(
          ErrorCodes.INTERNAL_ERROR,
          'An unexpected error occurred',
          correlationId
        )
      );
  };
}
