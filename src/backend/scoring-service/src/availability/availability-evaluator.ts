/**
 * Availability Evaluator
 *
 * Decides whether a contractor is free for a candidate window by testing it
 * against the occupied windows of their existing assignments.
 *
 * Working hours are not enforced here; only slot finding respects them.
 * The travel buffer widens the window before the start. Callers currently
 * always pass 0.
 */

import {
  getJobWindow,
  getLogger,
  InvalidArgumentError,
  NotFoundError,
  type Assignment,
  type Logger,
} from '@dispatch/shared';

import type { AssignmentRepository, ContractorRepository } from '../repositories/repositories.js';
import { addHours, addMinutes, intervalsOverlap, isValidDate, type TimeWindow } from './time-window.js';

function validateAvailabilityArguments(
  desiredStart: Date,
  jobDurationHours: number,
  travelTimeMinutes: number
): void {
  if (!isValidDate(desiredStart)) {
    throw new InvalidArgumentError('Desired start must be a valid date');
  }
  if (!Number.isFinite(jobDurationHours) || jobDurationHours <= 0) {
    throw new InvalidArgumentError('Job duration must be greater than zero', { jobDurationHours });
  }
  if (!Number.isFinite(travelTimeMinutes) || travelTimeMinutes < 0) {
    throw new InvalidArgumentError('Travel time cannot be negative', { travelTimeMinutes });
  }
}

/**
 * Candidate window: [start - travelTimeMinutes, start + duration)
 */
export function getCandidateWindow(
  desiredStart: Date,
  jobDurationHours: number,
  travelTimeMinutes = 0
): TimeWindow {
  return {
    start: addMinutes(desiredStart, -travelTimeMinutes),
    end: addHours(desiredStart, jobDurationHours),
  };
}

/**
 * Returns the first existing assignment whose window overlaps the candidate
 */
export function findConflictingAssignment(
  existingAssignments: readonly Assignment[],
  candidate: TimeWindow
): Assignment | undefined {
  return existingAssignments.find((assignment) =>
    intervalsOverlap(candidate, getJobWindow(assignment.job))
  );
}

/**
 * Pure availability check over the supplied assignments
 *
 * @throws InvalidArgumentError for a non-positive duration or negative travel time
 */
export function isAvailable(
  existingAssignments: readonly Assignment[],
  desiredStart: Date,
  jobDurationHours: number,
  travelTimeMinutes = 0
): boolean {
  validateAvailabilityArguments(desiredStart, jobDurationHours, travelTimeMinutes);
  const candidate = getCandidateWindow(desiredStart, jobDurationHours, travelTimeMinutes);
  return findConflictingAssignment(existingAssignments, candidate) === undefined;
}

export class AvailabilityEvaluator {
  constructor(
    private readonly contractors: ContractorRepository,
    private readonly assignments: AssignmentRepository,
    private readonly logger: Logger = getLogger()
  ) {}

  /**
   * Loads the contractor's assignments for the desired UTC date and checks the window
   *
   * @throws InvalidArgumentError for a non-positive duration or negative travel time
   * @throws NotFoundError when the contractor does not exist
   */
  async checkContractorAvailability(
    contractorId: string,
    desiredStart: Date,
    jobDurationHours: number,
    travelTimeMinutes = 0
  ): Promise<boolean> {
    validateAvailabilityArguments(desiredStart, jobDurationHours, travelTimeMinutes);

    const contractor = await this.contractors.getContractorById(contractorId);
    if (!contractor) {
      throw new NotFoundError(`Contractor ${contractorId} not found`, { contractorId });
    }

    const existing = await this.assignments.getContractorAssignmentsByDate(
      contractorId,
      desiredStart
    );
    const candidate = getCandidateWindow(desiredStart, jobDurationHours, travelTimeMinutes);
    const conflict = findConflictingAssignment(existing, candidate);

    if (conflict) {
      this.logger.debug('Contractor has a conflicting assignment', {
        contractorId,
        assignmentId: conflict.assignmentId,
        desiredStart: desiredStart.toISOString(),
      });
      return false;
    }

    return true;
  }
}
