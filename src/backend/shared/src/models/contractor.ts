/**
 * Contractor Data Models and Zod Schemas
 *
 * Contractors are the field technicians a dispatcher can assign to jobs.
 *
 * @edgecase averageRating is null until the first review is posted
 * @edgecase workingHoursEnd may be at or before workingHoursStart (no bookable hours)
 */

import { z } from 'zod';

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Time-of-day schema in HH:MM (24h) form, no date component
 */
export const TimeOfDaySchema = z.string().regex(TIME_OF_DAY_PATTERN, 'Invalid time format (HH:MM)');

export type TimeOfDay = z.infer<typeof TimeOfDaySchema>;

/**
 * Working hours schema
 */
export const WorkingHoursSchema = z.object({
  start: TimeOfDaySchema,
  end: TimeOfDaySchema,
});

export type WorkingHours = z.infer<typeof WorkingHoursSchema>;

/**
 * Contractor schema
 */
export const ContractorSchema = z.object({
  contractorId: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  isActive: z.boolean(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  workingHours: WorkingHoursSchema,
  averageRating: z.number().min(0).max(5).nullable(),
  reviewCount: z.number().int().min(0),
});

export type Contractor = z.infer<typeof ContractorSchema>;

/**
 * Validates a contractor against the schema
 */
export function validateContractor(data: unknown): Contractor {
  return ContractorSchema.parse(data);
}

/**
 * Converts an HH:MM time of day into minutes after midnight
 */
export function timeOfDayToMinutes(time: TimeOfDay): number {
  const match = TIME_OF_DAY_PATTERN.exec(time);
  if (!match) {
    throw new Error(`Invalid time of day: ${time}`);
  }
  return Number(match[1]) * 60 + Number(match[2]);
}
