/**
 * Scoring Constants
 *
 * Weights and thresholds used to turn availability, rating and distance into a
 * single recommendation score. The defaults can be overridden per engine
 * instance; overrides are validated with zod.
 */

import { z } from 'zod';

/**
 * Weights of the three normalized signals. Must sum to 1.0.
 */
export const ScoringWeightsSchema = z
  .object({
    availability: z.number().min(0).max(1),
    rating: z.number().min(0).max(1),
    distance: z.number().min(0).max(1),
  })
  .refine((w) => Math.abs(w.availability + w.rating + w.distance - 1) < 0.001, {
    message: 'Scoring weights must sum to 1.0',
  });

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

export const ScoringConstantsSchema = z.object({
  weights: ScoringWeightsSchema,
  /** Distance at or beyond which the distance score is 0 */
  maxDistanceMiles: z.number().positive(),
  /** Rating score for contractors without reviews */
  nullRatingBaseline: z.number().min(0).max(1),
  maxRating: z.number().positive(),
  maxRecommendations: z.number().int().min(1).max(5),
  /**
   * Job duration assumed by the availability check. The job's own
   * estimatedDurationHours is not used there.
   */
  assumedJobDurationHours: z.number().positive(),
});

export type ScoringConstants = z.infer<typeof ScoringConstantsSchema>;

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  availability: 0.4,
  rating: 0.3,
  distance: 0.3,
};

export const DEFAULT_SCORING_CONSTANTS: ScoringConstants = {
  weights: DEFAULT_SCORING_WEIGHTS,
  maxDistanceMiles: 50,
  nullRatingBaseline: 0.5,
  maxRating: 5,
  maxRecommendations: 5,
  assumedJobDurationHours: 8,
};

/**
 * Merges overrides onto the defaults and validates the result
 *
 * @throws ZodError when an override is out of range or the weights do not sum to 1.0
 */
export function createScoringConstants(
  overrides: Partial<ScoringConstants> = {}
): ScoringConstants {
  return ScoringConstantsSchema.parse({ ...DEFAULT_SCORING_CONSTANTS, ...overrides });
}
