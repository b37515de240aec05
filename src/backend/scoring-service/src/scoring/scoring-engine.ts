/**
 * Scoring Engine
 *
 * Produces the ranked contractor shortlist for a job. Each candidate is scored
 * concurrently from availability, rating and distance; a contractor whose
 * scoring fails is left out instead of failing the request.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  getLogger,
  InvalidArgumentError,
  linkAbortSignals,
  NotFoundError,
  RecommendationMessage,
  RequestCancelledError,
  throwIfAborted,
  toError,
  type Job,
  type Logger,
  type MetricsCollector,
  type Recommendation,
  type RecommendationResponse,
  type ScoreComponents,
} from '@dispatch/shared';

import { isAvailable } from '../availability/availability-evaluator.js';
import { findFreeSlots } from '../availability/slot-finder.js';
import { formatUtcDate, isValidDate } from '../availability/time-window.js';
import type { DistanceProvider } from '../distance/distance-provider.js';
import type {
  AssignmentRepository,
  ContractorRepository,
  JobRepository,
} from '../repositories/repositories.js';
import {
  calculateScore,
  normalizeDistanceScore,
  normalizeRatingScore,
} from './normalization.js';
import {
  createScoringConstants,
  type ScoringConstants,
} from './scoring-constants.js';
import { DEFAULT_CONCURRENCY, mapWithConcurrency } from './worker-pool.js';

export interface ScoringEngineDependencies {
  jobs: JobRepository;
  contractors: ContractorRepository;
  assignments: AssignmentRepository;
  distanceProvider: DistanceProvider;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Clock used for the past-job check */
  now?: () => Date;
}

export interface ScoringEngineConfig {
  /** Maximum contractors scored at the same time */
  concurrency?: number;
  /** Cancels the whole request after this many milliseconds */
  requestTimeoutMs?: number;
  constants?: Partial<ScoringConstants>;
}

export interface GetRecommendationsOptions {
  signal?: AbortSignal;
  correlationId?: string;
}

export class ScoringEngine {
  private readonly constants: ScoringConstants;
  private readonly concurrency: number;
  private readonly requestTimeoutMs?: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: ScoringEngineDependencies,
    config: ScoringEngineConfig = {}
  ) {
    this.constants = createScoringConstants(config.constants);
    this.concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    this.requestTimeoutMs = config.requestTimeoutMs;
    this.logger = deps.logger ?? getLogger();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Ranks the candidate pool for a job and returns the top recommendations
   *
   * @throws NotFoundError when the job does not exist
   * @throws InvalidArgumentError when the job's desired time is in the past
   * @throws RequestCancelledError when the signal aborts or the request times out
   */
  async getRecommendations(
    jobId: string,
    requesterId: string,
    contractorListOnly: boolean,
    options: GetRecommendationsOptions = {}
  ): Promise<RecommendationResponse> {
    const linked = linkAbortSignals([options.signal], this.requestTimeoutMs);
    try {
      return await this.rankContractors(jobId, requesterId, contractorListOnly, {
        signal: linked.signal,
        correlationId: options.correlationId,
      });
    } catch (error) {
      if (error instanceof RequestCancelledError && linked.timedOut()) {
        throw new RequestCancelledError(
          `Recommendation request timed out after ${this.requestTimeoutMs}ms`,
          { jobId }
        );
      }
      throw error;
    } finally {
      linked.dispose();
    }
  }

  /**
   * Free one-hour slots of a contractor on the UTC day of `date`.
   * Faults other than an unknown contractor give an empty list.
   *
   * @throws NotFoundError when the contractor does not exist
   */
  async getAvailableTimeSlots(contractorId: string, date: Date): Promise<Date[]> {
    if (!isValidDate(date)) {
      throw new InvalidArgumentError('Date must be a valid date');
    }

    const contractor = await this.deps.contractors.getContractorById(contractorId);
    if (!contractor) {
      throw new NotFoundError(`Contractor ${contractorId} not found`, { contractorId });
    }

    return this.freeSlotsOrEmpty(contractorId, date, this.logger, async () =>
      findFreeSlots(
        contractor.workingHours,
        date,
        await this.deps.assignments.getContractorAssignmentsByDate(contractorId, date)
      )
    );
  }

  /**
   * Runs a slot computation; a fault is logged and gives an empty list
   */
  private async freeSlotsOrEmpty(
    contractorId: string,
    date: Date,
    logger: Logger,
    compute: () => Date[] | Promise<Date[]>
  ): Promise<Date[]> {
    try {
      return await compute();
    } catch (error) {
      logger.warn(
        'Failed to compute available time slots',
        { contractorId, date: formatUtcDate(date) },
        toError(error)
      );
      return [];
    }
  }

  private async rankContractors(
    jobId: string,
    requesterId: string,
    contractorListOnly: boolean,
    options: { signal: AbortSignal; correlationId?: string }
  ): Promise<RecommendationResponse> {
    const { signal } = options;
    const correlationId = options.correlationId ?? uuidv4();
    const logger = this.logger.child(correlationId);
    const stopTimer = this.deps.metrics?.startTimer();
    const startTime = Date.now();

    throwIfAborted(signal);

    const job = await this.deps.jobs.getJobById(jobId);
    if (!job) {
      throw new NotFoundError(`Job ${jobId} not found`, { jobId });
    }
    if (job.desiredDateTime.getTime() < this.now().getTime()) {
      throw new InvalidArgumentError('Job desired date-time is in the past', {
        jobId,
        desiredDateTime: job.desiredDateTime.toISOString(),
      });
    }

    const poolIds = contractorListOnly
      ? await this.deps.contractors.getDispatcherContractorList(requesterId)
      : await this.deps.contractors.getActiveContractorIds();
    const contractorIds = [...new Set(poolIds)];

    const settled = await mapWithConcurrency(
      contractorIds,
      (contractorId) => this.scoreContractor(job, contractorId, signal, logger),
      { concurrency: this.concurrency, signal }
    );

    const scored: Recommendation[] = [];
    let excludedCount = 0;
    settled.forEach((result, index) => {
      if (result.ok) {
        if (result.value) scored.push(result.value);
        return;
      }
      excludedCount++;
      logger.warn(
        'Contractor excluded from recommendations after a scoring failure',
        { contractorId: contractorIds[index], jobId },
        result.error
      );
    });

    // Array.prototype.sort is stable: ties keep pool order
    scored.sort((a, b) => b.score - a.score);
    const recommendations = scored.slice(0, this.constants.maxRecommendations);

    const processingTimeMs = stopTimer ? stopTimer().durationMs : Date.now() - startTime;
    logger.logRecommendation({
      correlationId,
      jobId,
      requesterId,
      contractorListOnly,
      candidateCount: contractorIds.length,
      scoredCount: scored.length,
      excludedCount,
      topScores: recommendations.map((r) => ({ contractorId: r.contractorId, score: r.score })),
      processingTimeMs,
    });
    this.deps.metrics?.recordRecommendation(
      processingTimeMs,
      scored.length,
      excludedCount,
      recommendations.map((r) => r.score)
    );

    return {
      recommendations,
      message:
        recommendations.length === 0
          ? RecommendationMessage.NO_AVAILABLE_CONTRACTORS
          : RecommendationMessage.SUCCESS,
    };
  }

  /**
   * Scores one contractor; resolves to null for a missing or inactive contractor
   */
  private async scoreContractor(
    job: Job,
    contractorId: string,
    signal: AbortSignal,
    logger: Logger
  ): Promise<Recommendation | null> {
    const contractor = await this.deps.contractors.getContractorById(contractorId);
    if (!contractor || !contractor.isActive) {
      logger.debug('Skipping missing or inactive contractor', { contractorId });
      return null;
    }

    throwIfAborted(signal);
    const assignments = await this.deps.assignments.getContractorAssignmentsByDate(
      contractorId,
      job.desiredDateTime
    );

    // Availability assumes a fixed job length, not job.estimatedDurationHours
    const available = isAvailable(
      assignments,
      job.desiredDateTime,
      this.constants.assumedJobDurationHours,
      0
    );

    const { distanceProvider } = this.deps;
    const [distanceMiles, travelTimeMinutes] = await Promise.all([
      distanceProvider.getDistance(
        job.latitude,
        job.longitude,
        contractor.latitude,
        contractor.longitude,
        signal
      ),
      distanceProvider.getTravelTime(
        job.latitude,
        job.longitude,
        contractor.latitude,
        contractor.longitude,
        signal
      ),
    ]);

    const components: ScoreComponents = {
      availability: available ? 1 : 0,
      rating: normalizeRatingScore(contractor.averageRating, this.constants),
      distance: normalizeDistanceScore(distanceMiles, this.constants),
    };
    const score = calculateScore(
      components.availability,
      components.rating,
      components.distance,
      this.constants
    );
    logger.debug('Contractor scored', { contractorId, score, components });

    const availableSlots = await this.freeSlotsOrEmpty(
      contractorId,
      job.desiredDateTime,
      logger,
      () => findFreeSlots(contractor.workingHours, job.desiredDateTime, assignments)
    );

    return {
      contractorId: contractor.contractorId,
      name: contractor.name,
      score,
      rating: contractor.averageRating,
      reviewCount: contractor.reviewCount,
      distanceMiles,
      travelTimeMinutes,
      availableSlots,
    };
  }
}
