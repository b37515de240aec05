/**
 * Slot Finder
 *
 * Lists the one-hour slots inside a contractor's working hours that do not
 * overlap any existing assignment.
 */

import { getJobWindow, timeOfDayToMinutes, type Assignment, type WorkingHours } from '@dispatch/shared';

import { addHours, addMinutes, intervalsOverlap, startOfUtcDay } from './time-window.js';

export const SLOT_LENGTH_HOURS = 1;

/**
 * Yields slot starts from the working-hours start, one hour apart, while the
 * start is before the working-hours end. The last slot may run past the end
 * when working hours are not a whole number of hours.
 */
export function* generateSlotStarts(workingHours: WorkingHours, date: Date): Generator<Date> {
  const dayStart = startOfUtcDay(date);
  const end = addMinutes(dayStart, timeOfDayToMinutes(workingHours.end));

  for (
    let slot = addMinutes(dayStart, timeOfDayToMinutes(workingHours.start));
    slot.getTime() < end.getTime();
    slot = addHours(slot, SLOT_LENGTH_HOURS)
  ) {
    yield slot;
  }
}

/**
 * Free one-hour slots for the UTC day of `date`, in chronological order.
 * Working hours that end at or before they start give an empty list.
 */
export function findFreeSlots(
  workingHours: WorkingHours,
  date: Date,
  existingAssignmentsOnDate: readonly Assignment[]
): Date[] {
  const occupied = existingAssignmentsOnDate.map((assignment) => getJobWindow(assignment.job));
  const free: Date[] = [];

  for (const start of generateSlotStarts(workingHours, date)) {
    const slot = { start, end: addHours(start, SLOT_LENGTH_HOURS) };
    if (!occupied.some((window) => intervalsOverlap(slot, window))) {
      free.push(start);
    }
  }

  return free;
}
