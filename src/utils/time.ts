// ============================================================================
// Time Helpers - timestamp parsing, hour-of-day in an endpoint timezone,
// and time range construction/validation
// ============================================================================

import { ValidationError } from '../core/errors';
import { TimeRange } from '../types';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export function parseTimestamp(value: string | Date | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export type HourResolver = (date: Date) => number;

/**
 * Returns a function mapping an instant to its hour (0-23) in `timezone`,
 * or null when the zone is not a valid IANA name.
 */
export function hourResolver(timezone: string): HourResolver | null {
  if (timezone.toUpperCase() === 'UTC') {
    return (date) => date.getUTCHours();
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', { timeZone: timezone, hour: 'numeric', hourCycle: 'h23' });
  } catch {
    return null;
  }

  return (date) => {
    const hourPart = formatter.formatToParts(date).find((p) => p.type === 'hour');
    const hour = hourPart ? parseInt(hourPart.value, 10) : date.getUTCHours();
    return hour % 24;
  };
}

// ---------------------------------------------------------------------------
// Time Range
// ---------------------------------------------------------------------------
export interface TimeRangeOptions {
  now: Date;
  defaultDays: number;
  maxDays: number;
}

function parseBound(value: string, label: string, endOfDay: boolean): Date {
  const trimmed = value.trim();
  if (DATE_ONLY.test(trimmed)) {
    const date = new Date(`${trimmed}T00:00:00.000Z`);
    if (Number.isNaN(date.getTime())) {
      throw new ValidationError(`Invalid ${label}: ${value}`);
    }
    return endOfDay ? new Date(date.getTime() + DAY_MS - 1) : date;
  }

  const date = new Date(trimmed);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid ${label}: ${value}`);
  }
  return date;
}

export function validateTimeRange(range: TimeRange, maxDays: number): TimeRange {
  if (range.start.getTime() > range.end.getTime()) {
    throw new ValidationError(
      `start_date (${range.start.toISOString()}) must not be after end_date (${range.end.toISOString()})`,
    );
  }
  if (range.end.getTime() - range.start.getTime() > maxDays * DAY_MS) {
    throw new ValidationError(`Time range exceeds the maximum of ${maxDays} days`);
  }
  return range;
}

/**
 * Builds an inclusive range from optional caller bounds. A date-only end
 * (YYYY-MM-DD) covers that whole day; missing bounds default to the
 * `defaultDays` window ending at `now`.
 */
export function createTimeRange(
  start: string | undefined,
  end: string | undefined,
  options: TimeRangeOptions,
): TimeRange {
  const endDate = end ? parseBound(end, 'end_date', true) : new Date(options.now.getTime());
  const startDate = start
    ? parseBound(start, 'start_date', false)
    : new Date(endDate.getTime() - options.defaultDays * DAY_MS);

  return validateTimeRange({ start: startDate, end: endDate }, options.maxDays);
}

export function isWithinRange(date: Date, range: TimeRange): boolean {
  const t = date.getTime();
  return t >= range.start.getTime() && t <= range.end.getTime();
}
