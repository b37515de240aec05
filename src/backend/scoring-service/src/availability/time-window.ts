/**
 * Time Window Helpers
 *
 * Half-open [start, end) intervals on UTC instants.
 */

import { InvalidArgumentError } from '@dispatch/shared';

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * Two half-open windows overlap when each starts before the other ends.
 * Back-to-back windows (one ends exactly when the next starts) do not overlap.
 */
export function intervalsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return a.start.getTime() < b.end.getTime() && a.end.getTime() > b.start.getTime();
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_PER_HOUR);
}

/**
 * Midnight UTC of the instant's calendar day
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function isSameUtcDay(a: Date, b: Date): boolean {
  return startOfUtcDay(a).getTime() === startOfUtcDay(b).getTime();
}

/**
 * Parses a YYYY-MM-DD calendar date as midnight UTC
 *
 * @throws InvalidArgumentError for malformed or impossible dates (2024-02-30)
 */
export function parseUtcDate(value: string): Date {
  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    throw new InvalidArgumentError(`Invalid date: ${value}`, { date: value });
  }
  return date;
}

export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}
