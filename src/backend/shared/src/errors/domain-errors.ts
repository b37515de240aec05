/**
 * Domain error types shared by the scoring service and the API layer.
 *
 * Each error carries a stable code and the HTTP status the API maps it to.
 */

export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

/**
 * Common error codes
 */
export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  DISTANCE_PROVIDER_ERROR: 'DISTANCE_PROVIDER_ERROR',
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 400,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
  }

  toJSON(): ErrorResponse {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * A job or contractor referenced by id does not exist
 */
export class NotFoundError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_FOUND, message, 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * An argument is outside its allowed range (durations, score components, past dates)
 */
export class InvalidArgumentError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_ARGUMENT, message, 400, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Distance or travel-time lookup failed
 */
export class DistanceProviderError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DISTANCE_PROVIDER_ERROR, message, 502, details);
    this.name = 'DistanceProviderError';
  }
}

/**
 * The caller's abort signal or the request timeout fired
 */
export class RequestCancelledError extends DomainError {
  constructor(message = 'Request was cancelled', details?: Record<string, unknown>) {
    super(ErrorCodes.REQUEST_CANCELLED, message, 503, details);
    this.name = 'RequestCancelledError';
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
