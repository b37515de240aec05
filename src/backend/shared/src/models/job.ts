/**
 * Job Data Models and Zod Schemas
 *
 * Defines the canonical schema for jobs in the dispatch system.
 * Jobs are service requests that need a contractor assigned.
 */

import { z } from 'zod';

// Job type enumeration
export const JobType = {
  FLOORING: 'flooring',
  HVAC: 'hvac',
  PLUMBING: 'plumbing',
  ELECTRICAL: 'electrical',
  OTHER: 'other',
} as const;

export type JobType = (typeof JobType)[keyof typeof JobType];

// Job status enumeration
export const JobStatus = {
  PENDING: 'pending',
  ASSIGNED: 'assigned',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

/**
 * Latitude/longitude pair
 */
export const CoordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

/**
 * Job schema
 *
 * @edgecase estimatedDurationHours may be fractional (e.g. 1.5)
 */
export const JobSchema = CoordinatesSchema.extend({
  jobId: z.string().min(1).max(100),
  jobType: z.enum(['flooring', 'hvac', 'plumbing', 'electrical', 'other']),
  status: z.enum(['pending', 'assigned', 'in_progress', 'completed', 'cancelled']).default('pending'),
  desiredDateTime: z.coerce.date(),
  estimatedDurationHours: z.number().positive().max(24 * 7),
  location: z.string().min(1).max(500),
});

export type Job = z.infer<typeof JobSchema>;

/**
 * Validates a job against the schema
 *
 * @returns Validated Job or throws ZodError with field-level details
 */
export function validateJob(data: unknown): Job {
  return JobSchema.parse(data);
}

/**
 * Returns the occupied window of a job: [desiredDateTime, desiredDateTime + duration)
 */
export function getJobWindow(job: Pick<Job, 'desiredDateTime' | 'estimatedDurationHours'>): {
  start: Date;
  end: Date;
} {
  const start = job.desiredDateTime;
  const end = new Date(start.getTime() + job.estimatedDurationHours * 60 * 60 * 1000);
  return { start, end };
}
