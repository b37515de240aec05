/**
 * Service wiring
 *
 * Builds the logger, metrics, repositories, distance provider and scoring
 * engine from the application configuration.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  CacheClient,
  createLogger,
  createMetricsCollector,
  InMemoryCacheStore,
  type AppConfig,
  type Logger,
  type MetricsCollector,
} from '@dispatch/shared';
import {
  AvailabilityEvaluator,
  CachedDistanceProvider,
  createInMemoryRepositories,
  HaversineDistanceProvider,
  HttpDistanceProvider,
  ScoringEngine,
  type DistanceProvider,
  type InMemoryRepositories,
} from '@dispatch/scoring-service';

export const SeedDataSchema = z.object({
  jobs: z.array(z.unknown()).default([]),
  contractors: z.array(z.unknown()).default([]),
  assignments: z.array(z.unknown()).default([]),
  dispatcherContractorLists: z.record(z.array(z.string())).default({}),
});

export type SeedData = z.infer<typeof SeedDataSchema>;

export interface ServiceDependencies {
  logger: Logger;
  metrics: MetricsCollector;
  repositories: InMemoryRepositories;
  distanceProvider: DistanceProvider;
  engine: ScoringEngine;
  availability: AvailabilityEvaluator;
}

/**
 * Loads seed records into the repositories. Every record is validated.
 */
export function seedRepositories(repositories: InMemoryRepositories, data: unknown): SeedData {
  const seed = SeedDataSchema.parse(data);
  seed.jobs.forEach((job) => repositories.jobs.save(job));
  seed.contractors.forEach((contractor) => repositories.contractors.save(contractor));
  seed.assignments.forEach((assignment) => repositories.assignments.save(assignment));
  for (const [dispatcherId, contractorIds] of Object.entries(seed.dispatcherContractorLists)) {
    repositories.contractors.setDispatcherContractorList(dispatcherId, contractorIds);
  }
  return seed;
}

export function loadSeedFile(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}

/**
 * Uses the HTTP distance matrix when an API key is configured, the offline
 * Haversine estimate otherwise
 */
export function createDistanceProvider(
  config: AppConfig,
  logger: Logger,
  metrics: MetricsCollector
): DistanceProvider {
  if (!config.DISTANCE_API_KEY) {
    return new HaversineDistanceProvider();
  }

  const http = new HttpDistanceProvider(
    {
      apiUrl: config.DISTANCE_API_URL,
      apiKey: config.DISTANCE_API_KEY,
      timeoutMs: config.DISTANCE_TIMEOUT_MS,
    },
    logger,
    metrics
  );

  return new CachedDistanceProvider(http, new CacheClient(new InMemoryCacheStore()), {
    ttlHours: config.DISTANCE_CACHE_TTL_HOURS,
    logger,
    metrics,
  });
}

export function createServiceDependencies(
  config: AppConfig,
  overrides: Partial<ServiceDependencies> = {}
): ServiceDependencies {
  const logger = overrides.logger ?? createLogger({ minLevel: config.LOG_LEVEL });
  const metrics = overrides.metrics ?? createMetricsCollector();
  const repositories = overrides.repositories ?? createInMemoryRepositories();

  if (!overrides.repositories && config.SEED_DATA_FILE) {
    const seed = seedRepositories(repositories, loadSeedFile(config.SEED_DATA_FILE));
    logger.info('Loaded seed data', {
      file: config.SEED_DATA_FILE,
      jobs: seed.jobs.length,
      contractors: seed.contractors.length,
      assignments: seed.assignments.length,
    });
  }

  const distanceProvider =
    overrides.distanceProvider ?? createDistanceProvider(config, logger, metrics);

  const engine =
    overrides.engine ??
    new ScoringEngine(
      {
        jobs: repositories.jobs,
        contractors: repositories.contractors,
        assignments: repositories.assignments,
        distanceProvider,
        logger,
        metrics,
      },
      {
        concurrency: config.SCORING_CONCURRENCY,
        requestTimeoutMs: config.RECOMMENDATION_TIMEOUT_MS,
      }
    );

  const availability =
    overrides.availability ??
    new AvailabilityEvaluator(repositories.contractors, repositories.assignments, logger);

  return { logger, metrics, repositories, distanceProvider, engine, availability };
}
