/**
 * Score Normalization
 *
 * Maps raw rating and distance values onto [0, 1] and blends the three signals
 * into the final two-decimal score.
 */

import { InvalidArgumentError } from '@dispatch/shared';

import { DEFAULT_SCORING_CONSTANTS, type ScoringConstants } from './scoring-constants.js';

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Rounds to two decimals, halves away from zero (0.125 -> 0.13)
 */
export function roundScore(value: number): number {
  return (Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

/**
 * Normalizes a 0-5 star rating. Contractors without a rating get the baseline.
 */
export function normalizeRatingScore(
  rating: number | null | undefined,
  constants: ScoringConstants = DEFAULT_SCORING_CONSTANTS
): number {
  if (rating === null || rating === undefined || Number.isNaN(rating)) {
    return constants.nullRatingBaseline;
  }
  return clamp01(rating / constants.maxRating);
}

/**
 * Normalizes a distance in miles: 0 miles scores 1, maxDistanceMiles or more scores 0
 */
export function normalizeDistanceScore(
  distanceMiles: number,
  constants: ScoringConstants = DEFAULT_SCORING_CONSTANTS
): number {
  if (Number.isNaN(distanceMiles)) {
    throw new InvalidArgumentError('Distance must be a number', { distanceMiles });
  }
  if (distanceMiles <= 0) return 1;
  if (distanceMiles >= constants.maxDistanceMiles) return 0;
  return clamp01(1 - distanceMiles / constants.maxDistanceMiles);
}

function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(`${name} score must be between 0 and 1`, { [name]: value });
  }
}

/**
 * Weighted blend of the three normalized signals
 *
 * @throws InvalidArgumentError when a component is outside [0, 1] or not finite
 */
export function calculateScore(
  availabilityScore: number,
  ratingScore: number,
  distanceScore: number,
  constants: ScoringConstants = DEFAULT_SCORING_CONSTANTS
): number {
  assertUnitInterval('availability', availabilityScore);
  assertUnitInterval('rating', ratingScore);
  assertUnitInterval('distance', distanceScore);

  const { weights } = constants;
  return roundScore(
    weights.availability * availabilityScore +
      weights.rating * ratingScore +
      weights.distance * distanceScore
  );
}
