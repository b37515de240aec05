/**
 * Assignment Data Models and Zod Schemas
 *
 * An assignment links a contractor to a job. It carries no start/end of its own:
 * the occupied window comes from the assigned job's desired time and duration.
 */

import { z } from 'zod';

// Assignment status enumeration
export const AssignmentStatus = {
  PENDING: 'pending',
  ACCEPTED: 'accepted',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  DECLINED: 'declined',
} as const;

export type AssignmentStatus = (typeof AssignmentStatus)[keyof typeof AssignmentStatus];

/**
 * Statuses that still occupy the contractor's calendar
 */
export const ACTIVE_ASSIGNMENT_STATUSES: readonly AssignmentStatus[] = [
  AssignmentStatus.PENDING,
  AssignmentStatus.ACCEPTED,
  AssignmentStatus.IN_PROGRESS,
];

/**
 * Assignment schema
 */
export const AssignmentSchema = z.object({
  assignmentId: z.string().min(1).max(100),
  contractorId: z.string().min(1).max(100),
  jobId: z.string().min(1).max(100),
  status: z.enum(['pending', 'accepted', 'in_progress', 'completed', 'declined']),
  job: z.object({
    desiredDateTime: z.coerce.date(),
    estimatedDurationHours: z.number().min(0),
  }),
});

export type Assignment = z.infer<typeof AssignmentSchema>;

/**
 * Validates an assignment against the schema
 */
export function validateAssignment(data: unknown): Assignment {
  return AssignmentSchema.parse(data);
}

/**
 * Checks whether an assignment still blocks the contractor's time
 */
export function isActiveAssignment(assignment: Assignment): boolean {
  return ACTIVE_ASSIGNMENT_STATUSES.includes(assignment.status);
}
