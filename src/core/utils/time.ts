/**
 * Time parsing and wire formatting
 *
 * All instants are UTC. User-facing strings may be a date, a date-time, or a
 * date-time with fractional seconds; a trailing `Z` is accepted.
 */

import { ArgumentConflictError } from '../errors.js';
import { MS_PER_DAY } from '../constants.js';

const TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?)?Z?$/;

/**
 * Parse `YYYY-mm-dd`, `YYYY-mm-ddTHH:MM:SS` or `YYYY-mm-ddTHH:MM:SS.ffffff` as UTC
 *
 * @throws {ArgumentConflictError} When the string matches none of the formats
 */
export function parseTime(value: string): Date {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ArgumentConflictError(`Could not parse time or date from "${value}"`);
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = ''] = match;
  const ms = fraction ? Math.floor(Number(fraction.padEnd(6, '0')) / 1000) : 0;
  const date = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second), ms)
  );

  // Date.UTC rolls over out-of-range fields; reject instead
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    throw new ArgumentConflictError(`Could not parse time or date from "${value}"`);
  }
  return date;
}

/**
 * Format an instant the way the search endpoint expects it (second precision)
 */
export function formatSearchTime(date: Date): string {
  return date.toISOString().slice(0, 19);
}

/**
 * Format an instant for tables (millisecond precision, no zone suffix)
 */
export function formatTableTime(date: Date): string {
  return date.toISOString().slice(0, 23);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

export function floorToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

export function ceilToSecond(date: Date): Date {
  return new Date(Math.ceil(date.getTime() / 1000) * 1000);
}
