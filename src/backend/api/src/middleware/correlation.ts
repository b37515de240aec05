/**
 * Request Context Middleware
 *
 * Assigns each request a correlation id (from X-Correlation-ID or a new uuid),
 * echoes it on the response and records request latency.
 */

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { MetricsCollector } from '@dispatch/shared';

export const CORRELATION_HEADER = 'X-Correlation-ID';

export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
}

export interface ContextualRequest extends Request {
  context?: RequestContext;
}

export function getCorrelationId(req: ContextualRequest): string | undefined {
  return req.context?.correlationId;
}

export function requestContext(metrics?: MetricsCollector) {
  return (req: ContextualRequest, res: Response, next: NextFunction): void => {
    const header = req.header(CORRELATION_HEADER);
    const context: RequestContext = {
      correlationId: header && header.length <= 128 ? header : uuidv4(),
      requestId: uuidv4(),
      startTime: Date.now(),
    };
    req.context = context;

    res.setHeader(CORRELATION_HEADER, context.correlationId);
    res.setHeader('X-Request-ID', context.requestId);

    if (metrics) {
      res.on('finish', () => {
        metrics.recordRequestLatency(Date.now() - context.startTime, {
          method: req.method,
          status: String(res.statusCode),
        });
      });
    }

    next();
  };
}
