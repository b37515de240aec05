/**
 * Haversine Distance Provider
 *
 * Offline provider: road distance is approximated from the great-circle
 * distance and travel time from a 30 mph average speed.
 */

import { throwIfAborted } from '@dispatch/shared';

import {
  DistanceStatus,
  estimateRoadDistance,
  estimateTravelTimeMinutes,
  validateCoordinateList,
  validateCoordinates,
  type DistanceProvider,
  type DistanceResult,
  type LatLng,
} from './distance-provider.js';

export class HaversineDistanceProvider implements DistanceProvider {
  async getDistance(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    throwIfAborted(signal);
    validateCoordinates(originLat, originLng, 'origin');
    validateCoordinates(destLat, destLng, 'destination');
    return estimateRoadDistance(originLat, originLng, destLat, destLng);
  }

  async getTravelTime(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    const distance = await this.getDistance(originLat, originLng, destLat, destLng, signal);
    return estimateTravelTimeMinutes(distance);
  }

  async getDistanceBatch(
    origins: readonly LatLng[],
    destinations: readonly LatLng[],
    signal?: AbortSignal
  ): Promise<DistanceResult[][]> {
    throwIfAborted(signal);
    validateCoordinateList(origins, 'origins');
    validateCoordinateList(destinations, 'destinations');

    return origins.map((origin) =>
      destinations.map((destination) => {
        const distanceMiles = estimateRoadDistance(origin.lat, origin.lng, destination.lat, destination.lng);
        return {
          distanceMiles,
          travelTimeMinutes: estimateTravelTimeMinutes(distanceMiles),
          status: DistanceStatus.OK,
        };
      })
    );
  }
}
