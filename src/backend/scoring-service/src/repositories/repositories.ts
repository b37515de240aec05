/**
 * Repository Interfaces
 *
 * Read-side contracts the scoring service needs from persistence. Implementations
 * resolve to null for unknown ids rather than throwing.
 */

import type { Assignment, Contractor, Job } from '@dispatch/shared';

export interface JobRepository {
  getJobById(jobId: string): Promise<Job | null>;
}

export interface ContractorRepository {
  getContractorById(contractorId: string): Promise<Contractor | null>;
  /** Ids of every active contractor */
  getActiveContractorIds(): Promise<string[]>;
  /** Ids on the requesting dispatcher's personal contractor list */
  getDispatcherContractorList(requesterId: string): Promise<string[]>;
}

export interface AssignmentRepository {
  /**
   * Pending, accepted or in-progress assignments of the contractor whose job
   * starts on the UTC calendar day of `date`
   */
  getContractorAssignmentsByDate(contractorId: string, date: Date): Promise<Assignment[]>;
}

export interface Repositories {
  jobs: JobRepository;
  contractors: ContractorRepository;
  assignments: AssignmentRepository;
}
