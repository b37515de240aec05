/**
 * End-to-End Tests for the Recommendation Workflow
 *
 * Boots the service the way startServer does, from configuration and the
 * bundled seed file, and drives a dispatcher through recommendations, slots
 * and availability checks.
 */

import { beforeAll, describe, expect, it } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';

import {
  createApp,
  createServiceDependencies,
  toApiConfig,
} from '../../src/backend/api/src/index.js';
import type { ServiceDependencies } from '../../src/backend/api/src/bootstrap.js';
import { HaversineDistanceProvider } from '../../src/backend/scoring-service/src/index.js';
import { loadConfig, MetricNames } from '../../src/backend/shared/src/index.js';
import { createQuietLogger } from '../fixtures/dispatch-fixtures.js';

describe('Recommendation Workflow E2E', () => {
  let app: Express;
  let deps: ServiceDependencies;

  beforeAll(() => {
    const config = loadConfig({
      SEED_DATA_FILE: 'data/seed.json',
      SKIP_AUTH: 'true',
      ENABLE_SWAGGER: 'false',
    });
    deps = createServiceDependencies(config, { logger: createQuietLogger() });
    app = createApp(toApiConfig(config), deps);
  });

  it('loads the seed file into the repositories', async () => {
    expect(deps.distanceProvider).toBeInstanceOf(HaversineDistanceProvider);
    expect(await deps.repositories.jobs.getJobById('job-1001')).not.toBeNull();
    expect(await deps.repositories.contractors.getActiveContractorIds()).toEqual(['ctr-1', 'ctr-2']);
    expect(deps.logger.getLogEntries()[0].message).toBe('Loaded seed data');
  });

  it('recommends active contractors ranked by score', async () => {
    const response = await request(app)
      .get('/api/v1/recommendations?jobId=job-1001')
      .set('X-Correlation-ID', 'e2e-flow-1');

    expect(response.status).toBe(200);
    expect(response.headers['x-correlation-id']).toBe('e2e-flow-1');
    expect(response.body.message).toBe('Success');

    const [first, second] = response.body.recommendations;
    expect(response.body.recommendations.map((r: { contractorId: string }) => r.contractorId)).toEqual([
      'ctr-1',
      'ctr-2',
    ]);
    expect(first.score).toBeGreaterThan(second.score);
    expect(second.rating).toBeNull();
    expect(first.availableSlots).toEqual([
      '2030-06-03T08:00:00.000Z',
      '2030-06-03T09:00:00.000Z',
      '2030-06-03T12:00:00.000Z',
      '2030-06-03T13:00:00.000Z',
      '2030-06-03T14:00:00.000Z',
      '2030-06-03T15:00:00.000Z',
      '2030-06-03T16:00:00.000Z',
    ]);

    const completed = deps.logger
      .getLogEntries()
      .find((entry) => entry.message === 'Recommendation request completed');
    expect(completed?.correlationId).toBe('e2e-flow-1');
    expect(deps.metrics.getCounter(MetricNames.CONTRACTORS_SCORED)).toBe(2);
  });

  it('limits the pool to the dispatcher contractor list', async () => {
    const response = await request(app).get(
      '/api/v1/recommendations?jobId=job-1001&contractorListOnly=true'
    );

    expect(response.status).toBe(200);
    expect(response.body.recommendations.map((r: { contractorId: string }) => r.contractorId)).toEqual([
      'ctr-1',
    ]);
  });

  it('lists free slots around the seeded assignment', async () => {
    const response = await request(app).get('/api/v1/contractors/ctr-1/slots?date=2030-06-03');

    expect(response.status).toBe(200);
    expect(response.body.availableSlots).toHaveLength(7);
    expect(response.body.availableSlots[2]).toBe('2030-06-03T12:00:00.000Z');
  });

  it('checks availability against the seeded assignment', async () => {
    const busy = await request(app).get(
      '/api/v1/contractors/ctr-1/availability?start=2030-06-03T11:00:00.000Z&durationHours=1'
    );
    const free = await request(app).get(
      '/api/v1/contractors/ctr-1/availability?start=2030-06-03T12:00:00.000Z&durationHours=2'
    );

    expect(busy.body.available).toBe(false);
    expect(free.body.available).toBe(true);
  });
});
