/**
 * Distance Provider
 *
 * Contract for distance and travel-time lookups between two coordinates, plus
 * the great-circle helpers every implementation falls back to.
 */

import { z } from 'zod';
import { CoordinatesSchema, InvalidArgumentError } from '@dispatch/shared';

/**
 * Element status values of a distance matrix lookup
 */
export const DistanceStatus = {
  OK: 'OK',
  ZERO_RESULTS: 'ZERO_RESULTS',
  NOT_FOUND: 'NOT_FOUND',
  REQUEST_DENIED: 'REQUEST_DENIED',
  FALLBACK_USED: 'FALLBACK_USED',
} as const;

export type DistanceStatus = (typeof DistanceStatus)[keyof typeof DistanceStatus];

export const DistanceResultSchema = z.object({
  distanceMiles: z.number().min(0).optional(),
  travelTimeMinutes: z.number().int().min(0).optional(),
  /** A DistanceStatus value, or a provider-level status such as OVER_QUERY_LIMIT */
  status: z.string(),
  errorMessage: z.string().optional(),
});

export type DistanceResult = z.infer<typeof DistanceResultSchema>;

export interface LatLng {
  lat: number;
  lng: number;
}

export interface DistanceProvider {
  /** Road distance in miles */
  getDistance(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number>;

  /** Driving time in whole minutes */
  getTravelTime(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number>;

  /** Matrix of results indexed [origin][destination] */
  getDistanceBatch(
    origins: readonly LatLng[],
    destinations: readonly LatLng[],
    signal?: AbortSignal
  ): Promise<DistanceResult[][]>;
}

export const EARTH_RADIUS_MILES = 3959;

/** Straight-line to road distance approximation */
export const ROAD_DISTANCE_FACTOR = 1.3;

export const FALLBACK_SPEED_MPH = 30;

/**
 * @throws InvalidArgumentError when latitude or longitude is out of range
 */
export function validateCoordinates(lat: number, lng: number, label: string): void {
  const result = CoordinatesSchema.safeParse({ latitude: lat, longitude: lng });
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid ${label} coordinates: latitude must be between -90 and 90, longitude between -180 and 180`,
      { lat, lng }
    );
  }
}

export function validateCoordinateList(points: readonly LatLng[], label: string): void {
  if (points.length === 0) {
    throw new InvalidArgumentError(`${label} cannot be empty`);
  }
  points.forEach((point) => validateCoordinates(point.lat, point.lng, label));
}

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Great-circle distance in miles using the Haversine formula
 */
export function calculateHaversineDistance(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLng / 2) * Math.sin(dLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(Math.max(0, 1 - a)));
  return EARTH_RADIUS_MILES * c;
}

/**
 * Approximate road distance: great-circle distance times the road factor
 */
export function estimateRoadDistance(lat1: number, lng1: number, lat2: number, lng2: number): number {
  return calculateHaversineDistance(lat1, lng1, lat2, lng2) * ROAD_DISTANCE_FACTOR;
}

/**
 * Travel time at the fallback average speed, rounded up to whole minutes
 */
export function estimateTravelTimeMinutes(distanceMiles: number): number {
  return Math.ceil((distanceMiles / FALLBACK_SPEED_MPH) * 60);
}
