/**
 * Shared builders for scoring-service and API tests
 */

import {
  createLogger,
  delay,
  DistanceProviderError,
  validateAssignment,
  validateContractor,
  validateJob,
  type Assignment,
  type Contractor,
  type Job,
  type Logger,
} from '../../src/backend/shared/src/index.js';
import {
  createInMemoryRepositories,
  DistanceStatus,
  estimateTravelTimeMinutes,
  ScoringEngine,
  type DistanceProvider,
  type DistanceResult,
  type InMemoryRepositories,
  type LatLng,
  type ScoringEngineConfig,
} from '../../src/backend/scoring-service/src/index.js';
import type { MetricsCollector } from '../../src/backend/shared/src/index.js';

export const NOW = new Date('2030-01-01T00:00:00.000Z');

/** Three days after NOW at 09:00 UTC */
export const JOB_START = new Date('2030-01-04T09:00:00.000Z');

export const JOB_LOCATION = { latitude: 40, longitude: -105 };

export function hoursAfter(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 60 * 60 * 1000);
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  return validateJob({
    jobId: 'job-1',
    jobType: 'hvac',
    status: 'pending',
    desiredDateTime: JOB_START,
    estimatedDurationHours: 8,
    latitude: JOB_LOCATION.latitude,
    longitude: JOB_LOCATION.longitude,
    location: 'Test site',
    ...overrides,
  });
}

export function makeContractor(overrides: Partial<Contractor> = {}): Contractor {
  return validateContractor({
    contractorId: 'c-1',
    name: 'Test Contractor',
    isActive: true,
    latitude: 41,
    longitude: -105,
    workingHours: { start: '08:00', end: '17:00' },
    averageRating: 4.5,
    reviewCount: 10,
    ...overrides,
  });
}

let assignmentSequence = 0;

export function makeAssignment(
  contractorId: string,
  start: Date,
  durationHours: number,
  overrides: Partial<Assignment> = {}
): Assignment {
  assignmentSequence++;
  return validateAssignment({
    assignmentId: `a-${assignmentSequence}`,
    contractorId,
    jobId: `assigned-job-${assignmentSequence}`,
    status: 'accepted',
    job: { desiredDateTime: start, estimatedDurationHours: durationHours },
    ...overrides,
  });
}

export function coordinateKey(lat: number, lng: number): string {
  return `${lat},${lng}`;
}

/**
 * Distance provider answering from a fixed table keyed by destination
 * coordinates. Unknown destinations fail with DistanceProviderError.
 */
export class StubDistanceProvider implements DistanceProvider {
  public distanceCalls = 0;

  constructor(
    private readonly milesByDestination: Map<string, number>,
    private readonly delayMs = 0
  ) {}

  private async lookup(destLat: number, destLng: number, signal?: AbortSignal): Promise<number> {
    this.distanceCalls++;
    if (this.delayMs > 0) {
      await delay(this.delayMs, signal);
    }
    const miles = this.milesByDestination.get(coordinateKey(destLat, destLng));
    if (miles === undefined) {
      throw new DistanceProviderError(`No route to ${coordinateKey(destLat, destLng)}`);
    }
    return miles;
  }

  async getDistance(
    _originLat: number,
    _originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    return this.lookup(destLat, destLng, signal);
  }

  async getTravelTime(
    _originLat: number,
    _originLng: number,
    destLat: number,
    destLng: number,
    signal?: AbortSignal
  ): Promise<number> {
    return estimateTravelTimeMinutes(await this.lookup(destLat, destLng, signal));
  }

  async getDistanceBatch(
    _origins: readonly LatLng[],
    destinations: readonly LatLng[]
  ): Promise<DistanceResult[][]> {
    return [
      destinations.map((destination) => {
        const miles = this.milesByDestination.get(coordinateKey(destination.lat, destination.lng));
        return miles === undefined
          ? { status: DistanceStatus.NOT_FOUND }
          : { distanceMiles: miles, travelTimeMinutes: estimateTravelTimeMinutes(miles), status: DistanceStatus.OK };
      }),
    ];
  }
}

export function createQuietLogger(): Logger {
  return createLogger({ enableConsole: false, minLevel: 'debug' });
}

export interface TestContext {
  repositories: InMemoryRepositories;
  distances: Map<string, number>;
  distanceProvider: StubDistanceProvider;
  logger: Logger;
  engine: ScoringEngine;
}

/**
 * Adds a contractor to the repositories and registers its distance from the job
 */
export function addContractor(
  ctx: Pick<TestContext, 'repositories' | 'distances'>,
  contractor: Contractor,
  distanceMiles?: number
): Contractor {
  ctx.repositories.contractors.save(contractor);
  if (distanceMiles !== undefined) {
    ctx.distances.set(coordinateKey(contractor.latitude, contractor.longitude), distanceMiles);
  }
  return contractor;
}

export function createTestContext(
  options: { delayMs?: number; config?: ScoringEngineConfig; metrics?: MetricsCollector } = {}
): TestContext {
  const repositories = createInMemoryRepositories();
  const distances = new Map<string, number>();
  const distanceProvider = new StubDistanceProvider(distances, options.delayMs);
  const logger = createQuietLogger();
  const engine = new ScoringEngine(
    {
      jobs: repositories.jobs,
      contractors: repositories.contractors,
      assignments: repositories.assignments,
      distanceProvider,
      logger,
      metrics: options.metrics,
      now: () => NOW,
    },
    options.config
  );
  return { repositories, distances, distanceProvider, logger, engine };
}

/**
 * Seeds the three-contractor scenario: one near and highly rated, one far and
 * unrated, one booked during the job window
 */
export function seedThreeContractorScenario(ctx: TestContext): void {
  ctx.repositories.jobs.save(makeJob());
  addContractor(
    ctx,
    makeContractor({ contractorId: 'c-busy', name: 'Busy Contractor', latitude: 40.1, averageRating: 4, reviewCount: 7 }),
    10
  );
  addContractor(
    ctx,
    makeContractor({ contractorId: 'c-far', name: 'Far Contractor', latitude: 40.2, averageRating: null, reviewCount: 0 }),
    60
  );
  addContractor(
    ctx,
    makeContractor({ contractorId: 'c-near', name: 'Near Contractor', latitude: 40.3, averageRating: 4.5, reviewCount: 21 }),
    5
  );
  ctx.repositories.assignments.save(
    makeAssignment('c-busy', new Date('2030-01-04T13:00:00.000Z'), 2)
  );
}
