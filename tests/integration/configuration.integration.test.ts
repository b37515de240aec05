/**
 * Integration Tests for Configuration and Service Wiring
 *
 * Covers environment parsing, seed loading and the choice of distance
 * provider made at startup.
 */

import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import {
  createDistanceProvider,
  createServiceDependencies,
  seedRepositories,
} from '../../src/backend/api/src/bootstrap.js';
import { toApiConfig } from '../../src/backend/api/src/index.js';
import {
  CachedDistanceProvider,
  createInMemoryRepositories,
  HaversineDistanceProvider,
} from '../../src/backend/scoring-service/src/index.js';
import { createMetricsCollector, loadConfig } from '../../src/backend/shared/src/index.js';
import { createQuietLogger, makeContractor, makeJob } from '../fixtures/dispatch-fixtures.js';

describe('Configuration Integration Tests', () => {
  describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
      expect(loadConfig({})).toEqual({
        PORT: 3000,
        SKIP_AUTH: false,
        ENABLE_SWAGGER: true,
        LOG_LEVEL: 'info',
        DISTANCE_API_URL: 'https://maps.googleapis.com/maps/api/distancematrix/json',
        DISTANCE_API_KEY: '',
        DISTANCE_TIMEOUT_MS: 5000,
        DISTANCE_CACHE_TTL_HOURS: 24,
        SCORING_CONCURRENCY: 16,
      });
    });

    it('parses string values from the environment', () => {
      const config = loadConfig({
        PORT: '8080',
        SKIP_AUTH: 'true',
        ENABLE_SWAGGER: 'false',
        LOG_LEVEL: 'debug',
        DISTANCE_CACHE_TTL_HOURS: '0.5',
        SCORING_CONCURRENCY: '4',
        RECOMMENDATION_TIMEOUT_MS: '750',
      });

      expect(config.PORT).toBe(8080);
      expect(config.SKIP_AUTH).toBe(true);
      expect(config.ENABLE_SWAGGER).toBe(false);
      expect(config.LOG_LEVEL).toBe('debug');
      expect(config.DISTANCE_CACHE_TTL_HOURS).toBe(0.5);
      expect(config.SCORING_CONCURRENCY).toBe(4);
      expect(config.RECOMMENDATION_TIMEOUT_MS).toBe(750);
    });

    it.each([
      ['PORT', 'abc'],
      ['PORT', '70000'],
      ['SKIP_AUTH', 'yes'],
      ['LOG_LEVEL', 'verbose'],
      ['SCORING_CONCURRENCY', '0'],
      ['DISTANCE_API_URL', 'not a url'],
    ])('rejects %s=%s', (name, value) => {
      expect(() => loadConfig({ [name]: value })).toThrow(ZodError);
    });

    it('maps to the API configuration', () => {
      expect(toApiConfig(loadConfig({ PORT: '4000', SKIP_AUTH: 'true' }))).toEqual({
        port: 4000,
        auth: { audience: 'api://contractor-dispatch', skipAuth: true },
        enableSwagger: true,
      });
    });
  });

  describe('seedRepositories', () => {
    it('loads every record and dispatcher list', async () => {
      const repositories = createInMemoryRepositories();
      const seed = seedRepositories(repositories, {
        jobs: [makeJob()],
        contractors: [makeContractor(), makeContractor({ contractorId: 'c-2' })],
        dispatcherContractorLists: { 'dispatcher-1': ['c-2'] },
      });

      expect(seed.assignments).toEqual([]);
      expect(await repositories.jobs.getJobById('job-1')).not.toBeNull();
      expect(await repositories.contractors.getActiveContractorIds()).toEqual(['c-1', 'c-2']);
      expect(await repositories.contractors.getDispatcherContractorList('dispatcher-1')).toEqual(['c-2']);
    });

    it('rejects an invalid record', () => {
      const repositories = createInMemoryRepositories();

      expect(() =>
        seedRepositories(repositories, { contractors: [{ contractorId: 'c-1', name: 'Missing fields' }] })
      ).toThrow();
    });
  });

  describe('createDistanceProvider', () => {
    it('uses the Haversine estimate without an API key', () => {
      const provider = createDistanceProvider(loadConfig({}), createQuietLogger(), createMetricsCollector());

      expect(provider).toBeInstanceOf(HaversineDistanceProvider);
    });

    it('caches the HTTP distance matrix when an API key is set', () => {
      const provider = createDistanceProvider(
        loadConfig({ DISTANCE_API_KEY: 'test-key' }),
        createQuietLogger(),
        createMetricsCollector()
      );

      expect(provider).toBeInstanceOf(CachedDistanceProvider);
    });
  });

  describe('createServiceDependencies', () => {
    it('keeps overrides and starts empty without a seed file', async () => {
      const logger = createQuietLogger();
      const deps = createServiceDependencies(loadConfig({}), { logger });

      expect(deps.logger).toBe(logger);
      expect(await deps.repositories.contractors.getActiveContractorIds()).toEqual([]);
      expect(logger.getLogEntries()).toEqual([]);
    });
  });
});
