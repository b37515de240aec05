/**
 * Authentication Middleware
 *
 * Reads the bearer token, checks its structure, audience and expiry, and
 * attaches the user to the request. Signature verification belongs to the
 * identity provider integration and is not done here.
 */

import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import { ErrorCodes } from '@dispatch/shared';

import { getCorrelationId, type ContextualRequest } from './correlation.js';
import { createErrorResponse } from './error-handler.js';

export const UserRole = {
  DISPATCHER: 'Dispatcher',
  CUSTOMER: 'Customer',
  CONTRACTOR: 'Contractor',
} as const;

export type UserRole = (typeof UserRole)[keyof typeof UserRole];

const USER_ROLES: readonly string[] = Object.values(UserRole);

/**
 * Authenticated user information extracted from token
 */
export interface AuthenticatedUser {
  userId: string;
  email: string;
  name: string;
  roles: UserRole[];
  tokenExpiry: Date;
}

export interface AuthenticatedRequest extends ContextualRequest {
  user?: AuthenticatedUser;
}

export interface TokenValidationResult {
  valid: boolean;
  user?: AuthenticatedUser;
  error?: string;
}

export interface AuthConfig {
  /** Expected `aud` claim */
  audience: string;
  /** Whether to skip authentication (for development) */
  skipAuth?: boolean;
}

export const defaultAuthConfig: AuthConfig = {
  audience: 'api://contractor-dispatch',
  skipAuth: false,
};

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  aud: z.string(),
  exp: z.number(),
  iat: z.number(),
  email: z.string().optional(),
  name: z.string().optional(),
  roles: z.array(z.string()).optional(),
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * A JWT is three base64url segments separated by dots
 */
export function validateTokenStructure(token: string): boolean {
  const parts = token.split('.');
  return parts.length === 3 && parts.every((part) => /^[A-Za-z0-9_-]+$/.test(part));
}

export function decodeTokenPayload(token: string): unknown {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return null;
  }

  try {
    return JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'));
  } catch {
    return null;
  }
}

export function isValidRole(role: string): role is UserRole {
  return USER_ROLES.includes(role);
}

export function extractRoles(claims: TokenClaims): UserRole[] {
  return (claims.roles ?? []).filter(isValidRole);
}

export function validateToken(
  token: string,
  config: AuthConfig = defaultAuthConfig,
  now: Date = new Date()
): TokenValidationResult {
  if (!validateTokenStructure(token)) {
    return { valid: false, error: 'Invalid token structure' };
  }

  const parsed = TokenClaimsSchema.safeParse(decodeTokenPayload(token));
  if (!parsed.success) {
    const missing = parsed.error.issues[0]?.path.join('.') || 'payload';
    return { valid: false, error: `Missing or invalid claim: ${missing}` };
  }

  const claims = parsed.data;
  if (claims.aud !== config.audience) {
    return { valid: false, error: 'Invalid audience' };
  }
  if (claims.exp * 1000 < now.getTime()) {
    return { valid: false, error: 'Token has expired' };
  }

  return {
    valid: true,
    user: {
      userId: claims.sub,
      email: claims.email ?? '',
      name: claims.name ?? '',
      roles: extractRoles(claims),
      tokenExpiry: new Date(claims.exp * 1000),
    },
  };
}

/**
 * Creates an unsigned token for development and tests
 */
export function createMockToken(
  user: Partial<AuthenticatedUser>,
  audience: string = defaultAuthConfig.audience,
  expiresInSeconds = 3600
): string {
  const issuedAt = Math.floor(Date.now() / 1000);
  const header = { alg: 'RS256', typ: 'JWT' };
  const payload = {
    sub: user.userId ?? 'mock-user-id',
    email: user.email ?? 'mock@example.com',
    name: user.name ?? 'Mock User',
    roles: user.roles ?? [UserRole.DISPATCHER],
    aud: audience,
    iat: issuedAt,
    exp: issuedAt + expiresInSeconds,
  };

  const encodeBase64Url = (obj: object): string =>
    Buffer.from(JSON.stringify(obj)).toString('base64url');

  return `${encodeBase64Url(header)}.${encodeBase64Url(payload)}.mock-signature`;
}

export function authMiddleware(config: AuthConfig = defaultAuthConfig) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (config.skipAuth) {
      req.user = {
        userId: 'dev-dispatcher',
        email: 'dev@example.com',
        name: 'Development Dispatcher',
        roles: [UserRole.DISPATCHER],
        tokenExpiry: new Date(Date.now() + 3600000),
      };
      next();
      return;
    }

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      res
        .status(401)
        .json(
          createErrorResponse(
            ErrorCodes.UNAUTHORIZED,
            'Missing or invalid Authorization header. Bearer token required.',
            getCorrelationId(req)
          )
        );
      return;
    }

    const result = validateToken(token, config);
    if (!result.valid || !result.user) {
      res
        .status(401)
        .json(
          createErrorResponse(
            ErrorCodes.UNAUTHORIZED,
            result.error ?? 'Invalid token',
            getCorrelationId(req)
          )
        );
      return;
    }

    req.user = result.user;
    next();
  };
}

