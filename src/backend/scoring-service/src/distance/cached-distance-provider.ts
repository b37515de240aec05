/**
 * Cached Distance Provider
 *
 * Decorates another DistanceProvider with a TTL cache. Cache faults are logged
 * and the lookup falls through to the inner provider.
 */

import { z } from 'zod';
import {
  CacheClient,
  getLogger,
  throwIfAborted,
  toError,
  type Logger,
  type MetricsCollector,
} from '@dispatch/shared';

import {
  DistanceResultSchema,
  DistanceStatus,
  type DistanceProvider,
  type DistanceResult,
  type LatLng,
} from './distance-provider.js';

export const DEFAULT_DISTANCE_CACHE_TTL_HOURS = 24;

const CACHE_NAME = 'distance';

type CacheEntryType = 'distance' | 'traveltime' | 'pair';

/**
 * distance:{originLat},{originLng}:{destLat},{destLng}:{type} with 5-decimal coordinates
 */
export function buildDistanceCacheKey(
  originLat: number,
  originLng: number,
  destLat: number,
  destLng: number,
  type: CacheEntryType
): string {
  return `distance:${originLat.toFixed(5)},${originLng.toFixed(5)}:${destLat.toFixed(5)},${destLng.toFixed(5)}:${type}`;
}

export interface CachedDistanceProviderOptions {
  ttlHours?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class CachedDistanceProvider implements DistanceProvider {
  private readonly ttlSeconds: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(
    private readonly inner: DistanceProvider,
    private readonly cache: CacheClient = new CacheClient(),
    options: CachedDistanceProviderOptions = {}
  ) {
    this.ttlSeconds = (options.ttlHours ?? DEFAULT_DISTANCE_CACHE_TTL_HOURS) * 60 * 60;
    this.logger = options.logger ?? getLogger();
    this.metrics = options.metrics;
  }

  async getDistance(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    const key = buildDistanceCacheKey(originLat, originLng, destLat, destLng, 'distance');
    return this.getOrLoad(key, z.number().min(0), signal, () =>
      this.inner.getDistance(originLat, originLng, destLat, destLng, signal)
    );
  }

  async getTravelTime(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    const key = buildDistanceCacheKey(originLat, originLng, destLat, destLng, 'traveltime');
    return this.getOrLoad(key, z.number().int().min(0), signal, () =>
      this.inner.getTravelTime(originLat, originLng, destLat, destLng, signal)
    );
  }

  /**
   * Caches each origin/destination pair separately and asks the inner provider
   * only for the rows and columns that still have a missing pair
   */
  async getDistanceBatch(
    origins: readonly LatLng[],
    destinations: readonly LatLng[],
    signal?: AbortSignal
  ): Promise<DistanceResult[][]> {
    throwIfAborted(signal);

    const results: Array<Array<DistanceResult | null>> = [];
    for (const origin of origins) {
      const row: Array<DistanceResult | null> = [];
      for (const destination of destinations) {
        const key = buildDistanceCacheKey(origin.lat, origin.lng, destination.lat, destination.lng, 'pair');
        row.push(await this.readCache(key, DistanceResultSchema));
      }
      results.push(row);
    }

    const pendingOrigins = new Set<number>();
    const pendingDestinations = new Set<number>();
    results.forEach((row, i) =>
      row.forEach((result, j) => {
        if (result === null) {
          pendingOrigins.add(i);
          pendingDestinations.add(j);
        }
      })
    );

    if (pendingOrigins.size > 0) {
      const originIndices = [...pendingOrigins];
      const destinationIndices = [...pendingDestinations];

      const fetched = await this.inner.getDistanceBatch(
        originIndices.map((i) => origins[i]),
        destinationIndices.map((j) => destinations[j]),
        signal
      );

      for (const [row, i] of originIndices.entries()) {
        for (const [column, j] of destinationIndices.entries()) {
          const result = fetched[row]?.[column] ?? {
            status: DistanceStatus.NOT_FOUND,
            errorMessage: 'Missing matrix element',
          };
          results[i][j] = result;

          if (result.status === DistanceStatus.OK) {
            const key = buildDistanceCacheKey(
              origins[i].lat,
              origins[i].lng,
              destinations[j].lat,
              destinations[j].lng,
              'pair'
            );
            await this.writeCache(key, result);
          }
        }
      }
    }

    return results.map((row) =>
      row.map(
        (result) =>
          result ?? { status: DistanceStatus.NOT_FOUND, errorMessage: 'Missing matrix element' }
      )
    );
  }

  private async getOrLoad<T>(
    key: string,
    schema: z.ZodType<T>,
    signal: AbortSignal | undefined,
    load: () => Promise<T>
  ): Promise<T> {
    throwIfAborted(signal);

    const cached = await this.readCache(key, schema);
    if (cached !== null) {
      return cached;
    }

    const value = await load();
    await this.writeCache(key, value);
    return value;
  }

  private async readCache<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    try {
      const cached = await this.cache.get(key, schema);
      if (cached !== null) {
        this.logger.debug('Distance cache hit', { cacheKey: key });
        this.metrics?.recordCacheHit(CACHE_NAME);
        return cached;
      }
    } catch (error) {
      this.logger.warn('Distance cache read failed, calling provider', { cacheKey: key }, toError(error));
    }

    this.metrics?.recordCacheMiss(CACHE_NAME);
    return null;
  }

  private async writeCache(key: string, value: unknown): Promise<void> {
    try {
      await this.cache.set(key, value, this.ttlSeconds);
    } catch (error) {
      this.logger.warn('Distance cache write failed', { cacheKey: key }, toError(error));
    }
  }
}
