/**
 * HTTP Distance Matrix Provider
 *
 * Calls a distance-matrix endpoint (Google Maps Distance Matrix wire format)
 * with a per-attempt timeout and exponential backoff. Single-pair lookups fall
 * back to the Haversine estimate when the endpoint cannot answer.
 */

import { z } from 'zod';
import {
  delay,
  DistanceProviderError,
  getLogger,
  isDomainError,
  linkAbortSignals,
  RequestCancelledError,
  throwIfAborted,
  toError,
  type Logger,
  type MetricsCollector,
} from '@dispatch/shared';

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

export const METERS_TO_MILES = 0.000621371;

export interface HttpDistanceProviderConfig {
  apiUrl: string;
  apiKey: string;
  /** Timeout of a single HTTP attempt */
  timeoutMs: number;
  maxRetries: number;
  /** Delay before the second attempt; doubles after each failed attempt */
  initialDelayMs: number;
}

export const DEFAULT_HTTP_DISTANCE_CONFIG: HttpDistanceProviderConfig = {
  apiUrl: 'https://maps.googleapis.com/maps/api/distancematrix/json',
  apiKey: '',
  timeoutMs: 5000,
  maxRetries: 3,
  initialDelayMs: 100,
};

const DEPENDENCY_NAME = 'distance-matrix';

const MatrixValueSchema = z.object({
  value: z.number(),
  text: z.string().optional(),
});

const MatrixElementSchema = z.object({
  status: z.string(),
  distance: MatrixValueSchema.optional(),
  duration: MatrixValueSchema.optional(),
  error_message: z.string().optional(),
});

export const DistanceMatrixResponseSchema = z.object({
  status: z.string(),
  rows: z.array(z.object({ elements: z.array(MatrixElementSchema) })).default([]),
  error_message: z.string().optional(),
});

export type DistanceMatrixResponse = z.infer<typeof DistanceMatrixResponseSchema>;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

function formatPoints(points: readonly LatLng[]): string {
  return points.map((point) => `${point.lat},${point.lng}`).join('|');
}

/**
 * Converts a matrix response into DistanceResult rows sized origins x destinations
 */
export function parseDistanceMatrixResponse(
  response: DistanceMatrixResponse,
  originCount: number,
  destinationCount: number
): DistanceResult[][] {
  const results: DistanceResult[][] = [];

  for (let i = 0; i < originCount; i++) {
    const row: DistanceResult[] = [];
    for (let j = 0; j < destinationCount; j++) {
      if (response.status !== DistanceStatus.OK) {
        row.push({
          status: response.status,
          errorMessage: response.error_message ?? 'API request failed',
        });
        continue;
      }

      const element = response.rows[i]?.elements[j];
      if (!element) {
        row.push({ status: DistanceStatus.NOT_FOUND, errorMessage: 'Missing matrix element' });
      } else if (element.status === DistanceStatus.OK && element.distance && element.duration) {
        row.push({
          distanceMiles: element.distance.value * METERS_TO_MILES,
          travelTimeMinutes: Math.ceil(element.duration.value / 60),
          status: DistanceStatus.OK,
        });
      } else {
        row.push({
          status: element.status,
          errorMessage: element.error_message ?? `Status: ${element.status}`,
        });
      }
    }
    results.push(row);
  }

  return results;
}

export class HttpDistanceProvider implements DistanceProvider {
  private readonly config: HttpDistanceProviderConfig;

  constructor(
    config: Partial<HttpDistanceProviderConfig> = {},
    private readonly logger: Logger = getLogger(),
    private readonly metrics?: MetricsCollector,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)
  ) {
    this.config = { ...DEFAULT_HTTP_DISTANCE_CONFIG, ...config };
  }

  async getDistance(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    validateCoordinates(originLat, originLng, 'origin');
    validateCoordinates(destLat, destLng, 'destination');

    const result = await this.getSingleResult(originLat, originLng, destLat, destLng, signal);
    return result?.distanceMiles ?? estimateRoadDistance(originLat, originLng, destLat, destLng);
  }

  async getTravelTime(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    validateCoordinates(originLat, originLng, 'origin');
    validateCoordinates(destLat, destLng, 'destination');

    const result = await this.getSingleResult(originLat, originLng, destLat, destLng, signal);
    if (result?.travelTimeMinutes !== undefined) {
      return result.travelTimeMinutes;
    }
    return estimateTravelTimeMinutes(
      result?.distanceMiles ?? estimateRoadDistance(originLat, originLng, destLat, destLng)
    );
  }

  /**
   * @throws DistanceProviderError when every attempt fails or the body is malformed
   * @throws RequestCancelledError when the signal aborts
   */
  async getDistanceBatch(
    origins: readonly LatLng[],
    destinations: readonly LatLng[],
    signal?: AbortSignal
  ): Promise<DistanceResult[][]> {
    validateCoordinateList(origins, 'origins');
    validateCoordinateList(destinations, 'destinations');

    const response = await this.callWithRetry(formatPoints(origins), formatPoints(destinations), signal);
    if (response.status !== DistanceStatus.OK) {
      this.logger.warn('Distance matrix request returned an error status', {
        status: response.status,
        errorMessage: response.error_message,
      });
    }
    return parseDistanceMatrixResponse(response, origins.length, destinations.length);
  }

  /**
   * Looks up one pair; resolves to null when the endpoint fails so callers can
   * fall back to the Haversine estimate. Cancellation is rethrown.
   */
  private async getSingleResult(
    originLat: number,
    originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<DistanceResult | null> {
    try {
      const [[result]] = await this.getDistanceBatch(
        [{ lat: originLat, lng: originLng }],
        [{ lat: destLat, lng: destLng }],
        signal
      );
      if (result.status !== DistanceStatus.OK) {
        this.logger.warn('Distance lookup failed, using fallback estimate', {
          status: result.status,
          errorMessage: result.errorMessage,
        });
        return null;
      }
      return result;
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        throw error;
      }
      this.logger.warn('Distance lookup failed, using fallback estimate', undefined, toError(error));
      return null;
    }
  }

  private buildRequestUrl(origins: string, destinations: string): string {
    const url = new URL(this.config.apiUrl);
    url.searchParams.set('origins', origins);
    url.searchParams.set('destinations', destinations);
    url.searchParams.set('key', this.config.apiKey);
    url.searchParams.set('units', 'imperial');
    url.searchParams.set('mode', 'driving');
    return url.toString();
  }

  private async callWithRetry(
    origins: string,
    destinations: string,
    signal?: AbortSignal
  ): Promise<DistanceMatrixResponse> {
    let delayMs = this.config.initialDelayMs;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      throwIfAborted(signal);
      const startTime = Date.now();

      try {
        const response = await this.invokeEndpoint(origins, destinations, signal);
        this.recordDependency(Date.now() - startTime, true);
        return response;
      } catch (error) {
        this.recordDependency(Date.now() - startTime, false);
        if (error instanceof RequestCancelledError) {
          throw error;
        }
        lastError = toError(error);
        // Malformed bodies are not retried
        if (isDomainError(error)) {
          throw error;
        }
        this.logger.warn(
          `Distance matrix request failed, attempt ${attempt}/${this.config.maxRetries}`,
          undefined,
          lastError
        );
      }

      if (attempt < this.config.maxRetries) {
        await delay(delayMs, signal);
        delayMs *= 2;
      }
    }

    throw new DistanceProviderError(
      `Distance matrix unreachable after ${this.config.maxRetries} attempts`,
      { lastError: lastError?.message }
    );
  }

  private async invokeEndpoint(
    origins: string,
    destinations: string,
    signal?: AbortSignal
  ): Promise<DistanceMatrixResponse> {
    const linked = linkAbortSignals([signal], this.config.timeoutMs);

    try {
      const response = await this.fetchFn(this.buildRequestUrl(origins, destinations), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: linked.signal,
      });

      if (!response.ok) {
        throw new Error(`Distance matrix returned ${response.status}: ${response.statusText}`);
      }

      const body: unknown = await response.json();
      const parsed = DistanceMatrixResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new DistanceProviderError('Invalid distance matrix response format', {
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }
      return parsed.data;
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError();
      }
      if (linked.timedOut()) {
        throw new Error(`Distance matrix timeout exceeded (${this.config.timeoutMs}ms)`);
      }
      throw error;
    } finally {
      linked.dispose();
    }
  }

  private recordDependency(durationMs: number, success: boolean): void {
    this.logger.logDependency(DEPENDENCY_NAME, this.config.apiUrl, durationMs, success, 'HTTP');
    this.metrics?.recordDependencyLatency(DEPENDENCY_NAME, durationMs, success);
  }
}
