/**
 * Recommendation Data Models and Zod Schemas
 *
 * Defines score components, contractor recommendations and the response
 * returned to dispatchers.
 *
 * @property Recommendations are ordered by score, highest first
 */

import { z } from 'zod';

/**
 * Score components schema: three independent normalized signals
 */
export const ScoreComponentsSchema = z.object({
  availability: z.number().min(0).max(1),
  rating: z.number().min(0).max(1),
  distance: z.number().min(0).max(1),
});

export type ScoreComponents = z.infer<typeof ScoreComponentsSchema>;

/**
 * Contractor recommendation schema
 */
export const RecommendationSchema = z.object({
  contractorId: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  score: z.number().min(0).max(1),
  rating: z.number().min(0).max(5).nullable(),
  reviewCount: z.number().int().min(0),
  distanceMiles: z.number().min(0),
  travelTimeMinutes: z.number().int().min(0),
  availableSlots: z.array(z.coerce.date()),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

/**
 * Status messages returned with a recommendation response
 */
export const RecommendationMessage = {
  SUCCESS: 'Success',
  NO_AVAILABLE_CONTRACTORS: 'No available contractors',
} as const;

export type RecommendationMessage = (typeof RecommendationMessage)[keyof typeof RecommendationMessage];

/**
 * Recommendation response schema
 */
export const RecommendationResponseSchema = z.object({
  recommendations: z.array(RecommendationSchema).max(5),
  message: z.string().min(1),
});

export type RecommendationResponse = z.infer<typeof RecommendationResponseSchema>;

/**
 * Recommendation request schema (query string of GET /api/v1/recommendations)
 */
export const RecommendationRequestSchema = z.object({
  jobId: z.string().min(1).max(100),
  contractorListOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type RecommendationRequest = z.infer<typeof RecommendationRequestSchema>;

/**
 * Available slots request schema (GET /api/v1/contractors/:contractorId/slots)
 */
export const AvailableSlotsRequestSchema = z.object({
  contractorId: z.string().min(1).max(100),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Invalid date format (YYYY-MM-DD)'),
});

export type AvailableSlotsRequest = z.infer<typeof AvailableSlotsRequestSchema>;

/**
 * Validates a recommendation request
 */
export function validateRecommendationRequest(data: unknown): RecommendationRequest {
  return RecommendationRequestSchema.parse(data);
}

/**
 * Safely validates a recommendation request
 */
export function safeValidateRecommendationRequest(
  data: unknown
): z.SafeParseReturnType<unknown, RecommendationRequest> {
  return RecommendationRequestSchema.safeParse(data);
}

/**
 * Availability check request schema (GET /api/v1/contractors/:contractorId/availability)
 */
export const AvailabilityCheckRequestSchema = z.object({
  contractorId: z.string().min(1).max(100),
  start: z.string().datetime({ offset: true }).transform((value) => new Date(value)),
  durationHours: z.coerce.number().positive().max(24 * 7),
  travelTimeMinutes: z.coerce.number().min(0).default(0),
});

export type AvailabilityCheckRequest = z.infer<typeof AvailabilityCheckRequestSchema>;
