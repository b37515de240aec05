/**
 * In-Memory Repositories
 *
 * Map-backed repository implementations for local development and tests.
 * Records are validated with the shared zod schemas on insert.
 */

import {
  isActiveAssignment,
  validateAssignment,
  validateContractor,
  validateJob,
  type Assignment,
  type Contractor,
  type Job,
} from '@dispatch/shared';

import { isSameUtcDay } from '../availability/time-window.js';
import type {
  AssignmentRepository,
  ContractorRepository,
  JobRepository,
  Repositories,
} from './repositories.js';

export class InMemoryJobRepository implements JobRepository {
  private readonly jobs = new Map<string, Job>();

  constructor(jobs: unknown[] = []) {
    jobs.forEach((job) => this.save(job));
  }

  save(data: unknown): Job {
    const job = validateJob(data);
    this.jobs.set(job.jobId, job);
    return job;
  }

  async getJobById(jobId: string): Promise<Job | null> {
    return this.jobs.get(jobId) ?? null;
  }
}

export class InMemoryContractorRepository implements ContractorRepository {
  private readonly contractors = new Map<string, Contractor>();
  private readonly dispatcherLists = new Map<string, string[]>();

  constructor(contractors: unknown[] = []) {
    contractors.forEach((contractor) => this.save(contractor));
  }

  save(data: unknown): Contractor {
    const contractor = validateContractor(data);
    this.contractors.set(contractor.contractorId, contractor);
    return contractor;
  }

  setDispatcherContractorList(dispatcherId: string, contractorIds: string[]): void {
    this.dispatcherLists.set(dispatcherId, [...contractorIds]);
  }

  async getContractorById(contractorId: string): Promise<Contractor | null> {
    return this.contractors.get(contractorId) ?? null;
  }

  async getActiveContractorIds(): Promise<string[]> {
    return [...this.contractors.values()]
      .filter((contractor) => contractor.isActive)
      .map((contractor) => contractor.contractorId);
  }

  async getDispatcherContractorList(requesterId: string): Promise<string[]> {
    return [...(this.dispatcherLists.get(requesterId) ?? [])];
  }
}

export class InMemoryAssignmentRepository implements AssignmentRepository {
  private readonly assignments = new Map<string, Assignment>();

  constructor(assignments: unknown[] = []) {
    assignments.forEach((assignment) => this.save(assignment));
  }

  save(data: unknown): Assignment {
    const assignment = validateAssignment(data);
    this.assignments.set(assignment.assignmentId, assignment);
    return assignment;
  }

  async getContractorAssignmentsByDate(contractorId: string, date: Date): Promise<Assignment[]> {
    return [...this.assignments.values()].filter(
      (assignment) =>
        assignment.contractorId === contractorId &&
        isActiveAssignment(assignment) &&
        isSameUtcDay(assignment.job.desiredDateTime, date)
    );
  }
}

export interface InMemoryRepositories extends Repositories {
  jobs: InMemoryJobRepository;
  contractors: InMemoryContractorRepository;
  assignments: InMemoryAssignmentRepository;
}

export function createInMemoryRepositories(): InMemoryRepositories {
  return {
    jobs: new InMemoryJobRepository(),
    contractors: new InMemoryContractorRepository(),
    assignments: new InMemoryAssignmentRepository(),
  };
}
