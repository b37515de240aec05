/**
 * Integration Tests for the Scoring Engine
 *
 * Runs the engine against the in-memory repositories and a table-driven
 * distance provider: ranking, pool selection, failure isolation,
 * cancellation and slot listing.
 */

import { describe, expect, it } from 'vitest';

import { ScoringEngine } from '../../src/backend/scoring-service/src/index.js';
import {
  createMetricsCollector,
  InvalidArgumentError,
  MetricNames,
  NotFoundError,
  RequestCancelledError,
} from '../../src/backend/shared/src/index.js';
import {
  addContractor,
  coordinateKey,
  createQuietLogger,
  createTestContext,
  JOB_START,
  makeAssignment,
  makeContractor,
  makeJob,
  NOW,
  seedThreeContractorScenario,
  StubDistanceProvider,
} from '../fixtures/dispatch-fixtures.js';

function isoList(dates: Date[]): string[] {
  return dates.map((date) => date.toISOString());
}

describe('Scoring Engine Integration Tests', () => {
  describe('Ranking', () => {
    it('ranks the near, far and booked contractors by blended score', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response.message).toBe('Success');
      expect(response.recommendations.map((r) => [r.contractorId, r.score])).toEqual([
        ['c-near', 0.94],
        ['c-far', 0.55],
        ['c-busy', 0.48],
      ]);
    });

    it('fills in rating, distance and travel details', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);
      const far = response.recommendations[1];

      expect(far).toMatchObject({
        contractorId: 'c-far',
        name: 'Far Contractor',
        rating: null,
        reviewCount: 0,
        distanceMiles: 60,
        travelTimeMinutes: 120,
      });
    });

    it('lists free slots on the job date around existing assignments', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);
      const busy = response.recommendations.find((r) => r.contractorId === 'c-busy');

      expect(busy && isoList(busy.availableSlots)).toEqual([
        '2030-01-04T08:00:00.000Z',
        '2030-01-04T09:00:00.000Z',
        '2030-01-04T10:00:00.000Z',
        '2030-01-04T11:00:00.000Z',
        '2030-01-04T12:00:00.000Z',
        '2030-01-04T15:00:00.000Z',
        '2030-01-04T16:00:00.000Z',
      ]);
      expect(response.recommendations[0].availableSlots).toHaveLength(9);
    });

    it('checks availability over a fixed eight-hour window regardless of job length', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob({ estimatedDurationHours: 1 }));
      addContractor(ctx, makeContractor({ contractorId: 'c-1', averageRating: 5 }), 0);
      ctx.repositories.assignments.save(makeAssignment('c-1', new Date('2030-01-04T15:00:00.000Z'), 1));

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      // 0.4 * 0 + 0.3 * 1 + 0.3 * 1
      expect(response.recommendations[0].score).toBe(0.6);
    });

    it('does not apply working hours to the availability check', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob());
      addContractor(
        ctx,
        makeContractor({ contractorId: 'c-late', averageRating: 5, workingHours: { start: '12:00', end: '15:00' } }),
        0
      );

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response.recommendations[0].score).toBe(1);
      expect(isoList(response.recommendations[0].availableSlots)).toEqual([
        '2030-01-04T12:00:00.000Z',
        '2030-01-04T13:00:00.000Z',
        '2030-01-04T14:00:00.000Z',
      ]);
    });

    it('returns only the top five contractors', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob());
      for (let i = 1; i <= 7; i++) {
        addContractor(ctx, makeContractor({ contractorId: `c-${i}`, latitude: 40 + i / 10, averageRating: 4 }), i);
      }

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response.recommendations.map((r) => r.contractorId)).toEqual(['c-1', 'c-2', 'c-3', 'c-4', 'c-5']);
    });

    it('returns identical results for repeated requests', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const first = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);
      const second = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(second).toEqual(first);
    });
  });

  describe('Candidate pool', () => {
    it('skips inactive contractors in the active pool', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);
      addContractor(ctx, makeContractor({ contractorId: 'c-off', latitude: 40.9, isActive: false }), 1);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response.recommendations.map((r) => r.contractorId)).not.toContain('c-off');
      expect(response.recommendations).toHaveLength(3);
    });

    it('restricts the pool to the dispatcher list and drops duplicates and unknown ids', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);
      addContractor(ctx, makeContractor({ contractorId: 'c-off', latitude: 40.9, isActive: false }), 1);
      ctx.repositories.contractors.setDispatcherContractorList('dispatcher-1', [
        'c-busy',
        'c-missing',
        'c-off',
        'c-busy',
      ]);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', true);

      expect(response.recommendations.map((r) => r.contractorId)).toEqual(['c-busy']);
      expect(response.message).toBe('Success');
    });

    it('reports no available contractors for an empty dispatcher list', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-2', true);

      expect(response).toEqual({ recommendations: [], message: 'No available contractors' });
    });
  });

  describe('Request validation', () => {
    it('throws NotFoundError for an unknown job', async () => {
      const ctx = createTestContext();

      await expect(ctx.engine.getRecommendations('missing', 'dispatcher-1', false)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('throws InvalidArgumentError for a job in the past', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob({ desiredDateTime: new Date(NOW.getTime() - 1) }));

      await expect(ctx.engine.getRecommendations('job-1', 'dispatcher-1', false)).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
    });

    it('accepts a job scheduled exactly now', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob({ desiredDateTime: NOW }));

      await expect(ctx.engine.getRecommendations('job-1', 'dispatcher-1', false)).resolves.toEqual({
        recommendations: [],
        message: 'No available contractors',
      });
    });
  });

  describe('Failure isolation', () => {
    it('excludes a contractor whose distance lookup fails', async () => {
      const metrics = createMetricsCollector();
      const ctx = createTestContext({ metrics });
      seedThreeContractorScenario(ctx);
      // No distance entry, so the lookup fails
      addContractor(ctx, makeContractor({ contractorId: 'c-unroutable', latitude: 45 }));

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response.recommendations.map((r) => r.contractorId)).toEqual(['c-near', 'c-far', 'c-busy']);
      expect(metrics.getCounter(MetricNames.CONTRACTORS_EXCLUDED)).toBe(1);
      expect(metrics.getCounter(MetricNames.CONTRACTORS_SCORED)).toBe(3);
      const summary = metrics.getSummary();
      expect(Object.keys(summary)).toEqual(['counters', 'histograms']);
      expect(summary.histograms[MetricNames.RECOMMENDATION_SCORE].count).toBe(3);
      expect(summary.histograms[MetricNames.RECOMMENDATION_LATENCY].count).toBe(1);

      const warning = ctx.logger
        .getLogEntries()
        .find((entry) => entry.message === 'Contractor excluded from recommendations after a scoring failure');
      expect(warning?.metadata).toEqual({ contractorId: 'c-unroutable', jobId: 'job-1' });
      expect(warning?.error?.name).toBe('DistanceProviderError');
    });

    it('reports no available contractors when every lookup fails', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob());
      addContractor(ctx, makeContractor({ contractorId: 'c-1' }));
      addContractor(ctx, makeContractor({ contractorId: 'c-2', latitude: 42 }));

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response).toEqual({ recommendations: [], message: 'No available contractors' });
    });

    it('keeps a contractor with no slots when slot computation fails', async () => {
      const ctx = createTestContext();
      ctx.repositories.jobs.save(makeJob());
      const contractor = { ...makeContractor({ contractorId: 'c-ok' }), workingHours: { start: '9am', end: '17:00' } };
      const logger = createQuietLogger();
      const engine = new ScoringEngine({
        jobs: ctx.repositories.jobs,
        contractors: {
          getContractorById: async (id) => (id === 'c-ok' ? contractor : null),
          getActiveContractorIds: async () => ['c-ok'],
          getDispatcherContractorList: async () => [],
        },
        assignments: ctx.repositories.assignments,
        distanceProvider: new StubDistanceProvider(new Map([[coordinateKey(41, -105), 5]])),
        logger,
        now: () => NOW,
      });

      const response = await engine.getRecommendations('job-1', 'dispatcher-1', false, { correlationId: 'corr-slots' });

      expect(response.message).toBe('Success');
      expect(response.recommendations.map((r) => [r.contractorId, r.score, r.availableSlots])).toEqual([
        ['c-ok', 0.94, []],
      ]);
      expect(await engine.getAvailableTimeSlots('c-ok', JOB_START)).toEqual([]);

      const warnings = logger.getLogEntries().filter((entry) => entry.message === 'Failed to compute available time slots');
      expect(warnings).toHaveLength(2);
      expect(warnings[0].correlationId).toBe('corr-slots');
      expect(warnings[0].metadata).toEqual({ contractorId: 'c-ok', date: '2030-01-04' });
      expect(warnings[0].error?.message).toBe('Invalid time of day: 9am');
    });

    it('tags every log entry of a request with its correlation id', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false, { correlationId: 'corr-123' });

      const entries = ctx.logger.getLogEntries();
      expect(entries.length).toBeGreaterThan(0);
      expect(entries.every((entry) => entry.correlationId === 'corr-123')).toBe(true);
    });
  });

  describe('Cancellation', () => {
    it('fails immediately when the signal is already aborted', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);
      const controller = new AbortController();
      controller.abort();

      await expect(
        ctx.engine.getRecommendations('job-1', 'dispatcher-1', false, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestCancelledError);
      expect(ctx.distanceProvider.distanceCalls).toBe(0);
    });

    it('fails the whole request when aborted mid-flight', async () => {
      const ctx = createTestContext({ delayMs: 200 });
      seedThreeContractorScenario(ctx);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(
        ctx.engine.getRecommendations('job-1', 'dispatcher-1', false, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestCancelledError);
    });

    it('fails with a timeout message when the request deadline passes', async () => {
      const ctx = createTestContext({ delayMs: 200, config: { requestTimeoutMs: 10 } });
      seedThreeContractorScenario(ctx);

      await expect(ctx.engine.getRecommendations('job-1', 'dispatcher-1', false)).rejects.toThrow(
        'Recommendation request timed out after 10ms'
      );
    });

    it('completes normally when the deadline is not reached', async () => {
      const ctx = createTestContext({ delayMs: 5, config: { requestTimeoutMs: 5_000, concurrency: 1 } });
      seedThreeContractorScenario(ctx);

      const response = await ctx.engine.getRecommendations('job-1', 'dispatcher-1', false);

      expect(response.recommendations).toHaveLength(3);
    });
  });

  describe('Available time slots', () => {
    it('lists free slots for a contractor on a date', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const slots = await ctx.engine.getAvailableTimeSlots('c-busy', new Date('2030-01-04T00:00:00.000Z'));

      expect(slots).toHaveLength(7);
      expect(slots[5].toISOString()).toBe('2030-01-04T15:00:00.000Z');
    });

    it('lists every working hour on a day without assignments', async () => {
      const ctx = createTestContext();
      seedThreeContractorScenario(ctx);

      const slots = await ctx.engine.getAvailableTimeSlots('c-busy', new Date('2030-01-05T00:00:00.000Z'));

      expect(slots).toHaveLength(9);
    });

    it('throws NotFoundError for an unknown contractor', async () => {
      const ctx = createTestContext();

      await expect(ctx.engine.getAvailableTimeSlots('missing', NOW)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('throws InvalidArgumentError for an invalid date', async () => {
      const ctx = createTestContext();

      await expect(ctx.engine.getAvailableTimeSlots('c-1', new Date('nope'))).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
    });

    it('returns an empty list when assignments cannot be loaded', async () => {
      const ctx = createTestContext();
      ctx.repositories.contractors.save(makeContractor({ contractorId: 'c-1' }));
      const logger = createQuietLogger();
      const engine = new ScoringEngine({
        jobs: ctx.repositories.jobs,
        contractors: ctx.repositories.contractors,
        assignments: {
          getContractorAssignmentsByDate: async () => {
            throw new Error('assignment store offline');
          },
        },
        distanceProvider: new StubDistanceProvider(new Map()),
        logger,
        now: () => NOW,
      });

      await expect(engine.getAvailableTimeSlots('c-1', NOW)).resolves.toEqual([]);
      expect(logger.getLogEntries().map((entry) => entry.message)).toContain(
        'Failed to compute available time slots'
      );
    });
  });
});
