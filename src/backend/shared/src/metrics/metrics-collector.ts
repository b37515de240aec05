/**
 * Metrics Collection Module
 *
 * Counters and histograms for recommendation latency, per-contractor
 * scoring outcomes, distance lookups and cache effectiveness.
 */

import type { TelemetryClient } from '../logging/logger.js';

export const MetricType = {
  COUNTER: 'counter',
  HISTOGRAM: 'histogram',
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

export interface MetricEntry {
  name: string;
  type: MetricType;
  value: number;
  timestamp: Date;
  tags: Record<string, string>;
}

export interface HistogramBuckets {
  boundaries: number[];
  counts: number[];
  sum: number;
  count: number;
}

export interface TimerResult {
  durationMs: number;
  startTime: Date;
  endTime: Date;
}

export interface MetricsCollectorConfig {
  serviceName: string;
  enableConsole: boolean;
  telemetryClient?: TelemetryClient;
  defaultTags: Record<string, string>;
}

export const defaultMetricsConfig: MetricsCollectorConfig = {
  serviceName: 'contractor-dispatch',
  enableConsole: false,
  defaultTags: {},
};

/**
 * Predefined metric names
 */
export const MetricNames = {
  REQUEST_LATENCY: 'request_latency_ms',
  REQUEST_COUNT: 'request_count',
  REQUEST_ERROR_COUNT: 'request_error_count',

  RECOMMENDATION_LATENCY: 'recommendation_latency_ms',
  CONTRACTORS_SCORED: 'contractors_scored_count',
  CONTRACTORS_EXCLUDED: 'contractors_excluded_count',
  RECOMMENDATION_SCORE: 'recommendation_score',

  DEPENDENCY_LATENCY: 'dependency_latency_ms',
  DEPENDENCY_ERROR_COUNT: 'dependency_error_count',

  CACHE_HIT_COUNT: 'cache_hit_count',
  CACHE_MISS_COUNT: 'cache_miss_count',
} as const;

/**
 * Latency buckets in milliseconds (the recommendation target is 500ms)
 */
export const DEFAULT_LATENCY_BUCKETS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

export const DEFAULT_SCORE_BUCKETS = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0];

export class MetricsCollector {
  private config: MetricsCollectorConfig;
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, HistogramBuckets> = new Map();

  constructor(config: Partial<MetricsCollectorConfig> = {}) {
    this.config = { ...defaultMetricsConfig, ...config };
  }

  private createMetricKey(name: string, tags: Record<string, string>): string {
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return sortedTags ? `${name}:${sortedTags}` : name;
  }

  private recordEntry(
    name: string,
    type: MetricType,
    value: number,
    tags: Record<string, string> = {}
  ): void {
    const entry: MetricEntry = {
      name,
      type,
      value,
      timestamp: new Date(),
      tags: { ...this.config.defaultTags, ...tags },
    };

    if (this.config.enableConsole) {
      console.log(JSON.stringify(entry));
    }

    this.config.telemetryClient?.trackMetric(name, value, {
      service: this.config.serviceName,
      metricType: type,
      ...entry.tags,
    });
  }

  incrementCounter(name: string, value = 1, tags: Record<string, string> = {}): void {
    const key = this.createMetricKey(name, tags);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
    this.recordEntry(name, MetricType.COUNTER, value, tags);
  }

  getCounter(name: string, tags: Record<string, string> = {}): number {
    return this.counters.get(this.createMetricKey(name, tags)) ?? 0;
  }

  recordHistogram(
    name: string,
    value: number,
    tags: Record<string, string> = {},
    buckets: number[] = DEFAULT_LATENCY_BUCKETS
  ): void {
    const key = this.createMetricKey(name, tags);

    let histogram = this.histograms.get(key);
    if (!histogram) {
      histogram = {
        boundaries: buckets,
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      };
      this.histograms.set(key, histogram);
    }

    let bucketIndex = histogram.boundaries.findIndex((boundary) => value <= boundary);
    if (bucketIndex === -1) {
      bucketIndex = histogram.boundaries.length;
    }

    histogram.counts[bucketIndex] += 1;
    histogram.sum += value;
    histogram.count += 1;

    this.recordEntry(name, MetricType.HISTOGRAM, value, tags);
  }

  /**
   * Starts a timer and returns a function to stop it
   */
  startTimer(): () => TimerResult {
    const startTime = new Date();

    return () => {
      const endTime = new Date();
      return {
        durationMs: endTime.getTime() - startTime.getTime(),
        startTime,
        endTime,
      };
    };
  }

  recordRequestLatency(durationMs: number, tags: Record<string, string> = {}): void {
    this.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs, tags);
    this.incrementCounter(MetricNames.REQUEST_COUNT, 1, tags);
  }

  recordRequestError(tags: Record<string, string> = {}): void {
    this.incrementCounter(MetricNames.REQUEST_ERROR_COUNT, 1, tags);
  }

  /**
   * Records the outcome of one recommendation request
   */
  recordRecommendation(
    durationMs: number,
    scoredCount: number,
    excludedCount: number,
    scores: number[]
  ): void {
    this.recordHistogram(MetricNames.RECOMMENDATION_LATENCY, durationMs);
    this.incrementCounter(MetricNames.CONTRACTORS_SCORED, scoredCount);
    this.incrementCounter(MetricNames.CONTRACTORS_EXCLUDED, excludedCount);
    for (const score of scores) {
      this.recordHistogram(MetricNames.RECOMMENDATION_SCORE, score, {}, DEFAULT_SCORE_BUCKETS);
    }
  }

  recordDependencyLatency(dependencyName: string, durationMs: number, success: boolean): void {
    const tags = { dependency: dependencyName, success: String(success) };
    this.recordHistogram(MetricNames.DEPENDENCY_LATENCY, durationMs, tags);

    if (!success) {
      this.incrementCounter(MetricNames.DEPENDENCY_ERROR_COUNT, 1, { dependency: dependencyName });
    }
  }

  recordCacheHit(cacheName: string): void {
    this.incrementCounter(MetricNames.CACHE_HIT_COUNT, 1, { cache: cacheName });
  }

  recordCacheMiss(cacheName: string): void {
    this.incrementCounter(MetricNames.CACHE_MISS_COUNT, 1, { cache: cacheName });
  }

  /**
   * Gets a summary of all metrics
   */
  getSummary(): {
    counters: Record<string, number>;
    histograms: Record<string, { count: number; sum: number; average: number }>;
  } {
    const histograms: Record<string, { count: number; sum: number; average: number }> = {};
    for (const [key, histogram] of this.histograms) {
      histograms[key] = {
        count: histogram.count,
        sum: histogram.sum,
        average: histogram.count > 0 ? histogram.sum / histogram.count : 0,
      };
    }

    return {
      counters: Object.fromEntries(this.counters),
      histograms,
    };
  }
}

export function createMetricsCollector(
  config: Partial<MetricsCollectorConfig> = {}
): MetricsCollector {
  return new MetricsCollector(config);
}
