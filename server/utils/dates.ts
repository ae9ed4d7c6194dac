/**
 * Date utilities
 *
 * Settlement dates travel as YYYY-MM-DD strings. Timestamps of settlement
 * periods are UTC instants, so hour and day grouping is done in UTC.
 */

import { differenceInCalendarDays, eachDayOfInterval, format, isValid, parseISO } from 'date-fns';
import { ValidationError } from './errors';

// Standard date format used across the application: YYYY-MM-DD
export const DATE_FORMAT_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export const MAX_RANGE_DAYS = 31;

/**
 * Validate a date string in YYYY-MM-DD format
 */
export function isValidDateString(dateStr: string): boolean {
  if (!DATE_FORMAT_REGEX.test(dateStr)) {
    return false;
  }

  const date = parseISO(dateStr);
  return isValid(date) && format(date, 'yyyy-MM-dd') === dateStr;
}

/**
 * Parse a date string and ensure it's valid
 * Throws ValidationError if invalid
 */
export function parseDate(dateStr: string): Date {
  if (!isValidDateString(dateStr)) {
    throw new ValidationError(`Invalid date format: '${dateStr}'. Expected format: YYYY-MM-DD`);
  }

  return parseISO(dateStr);
}

/**
 * Format a Date object to YYYY-MM-DD string (local calendar)
 */
export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Get dates in a range (inclusive)
 */
export function getDateRange(startDateStr: string, endDateStr: string): string[] {
  const startDate = parseDate(startDateStr);
  const endDate = parseDate(endDateStr);

  if (startDate > endDate) {
    throw new ValidationError('End date must be on or after start date');
  }

  return eachDayOfInterval({ start: startDate, end: endDate }).map(formatDate);
}

/**
 * Validate an analysis window: well-formed dates, ordered, at most 31 days apart
 */
export function validateDateRange(startDateStr: string, endDateStr: string): void {
  const startDate = parseDate(startDateStr);
  const endDate = parseDate(endDateStr);
  const span = differenceInCalendarDays(endDate, startDate);

  if (span < 0) {
    throw new ValidationError('End date must be on or after start date', {
      context: { startDate: startDateStr, endDate: endDateStr }
    });
  }

  if (span > MAX_RANGE_DAYS) {
    throw new ValidationError(`Date range cannot exceed ${MAX_RANGE_DAYS} days`, {
      context: { startDate: startDateStr, endDate: endDateStr, span }
    });
  }
}

/**
 * Number of calendar days between two YYYY-MM-DD strings
 */
export function daysBetween(startDateStr: string, endDateStr: string): number {
  return differenceInCalendarDays(parseDate(endDateStr), parseDate(startDateStr));
}

/**
 * UTC calendar date (YYYY-MM-DD) of an ISO timestamp
 */
export function toUtcDateKey(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * UTC hour (0-23) of an ISO timestamp
 */
export function toUtcHour(timestamp: string): number {
  return new Date(timestamp).getUTCHours();
}
