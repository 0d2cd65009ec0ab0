/**
 * Time Segmentation Planner
 *
 * ComCat refuses to return more than 20,000 events per query. Given a time
 * range and a minimum magnitude, the planner estimates the expected number
 * of events from a global frequency table and splits the range into
 * contiguous segments, each expected to stay under the limit.
 *
 * The table is policy, not measurement: real activity can exceed it, so a
 * segment that comes back full is reported as a possible undercount by the
 * catalog client.
 *
 * @module time-segments
 */

import { InvalidRangeError } from '../core/errors.js';
import { MS_PER_DAY, SEARCH_LIMIT } from '../core/constants.js';

// ============================================================================
// Types
// ============================================================================

export interface TimeSegment {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Expected events per day, indexed by floor(minimum magnitude) 0..9
 */
export type FrequencyTable = readonly [
  number, number, number, number, number,
  number, number, number, number, number,
];

export interface PlannerOptions {
  readonly frequencyTable?: FrequencyTable;
  readonly searchLimit?: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_FREQUENCY_TABLE: FrequencyTable = [
  10000 / 7,
  3500 / 14,
  3000 / 18,
  4000 / 59,
  9000 / 151,
  3000 / 365,
  210 / 365,
  20 / 365,
  5 / 365,
  0.05 / 365,
];

/** Gap between one segment's end and the next segment's start */
export const SEGMENT_BOUNDARY_MS = 1;

// ============================================================================
// Planning
// ============================================================================

/**
 * Events per day expected at or above a magnitude
 */
export function expectedDailyRate(
  minMagnitude: number,
  table: FrequencyTable = DEFAULT_FREQUENCY_TABLE
): number {
  const bin = Math.min(Math.max(Math.floor(minMagnitude), 0), table.length - 1);
  return table[bin] ?? table[0];
}

function validateRange(start: Date, end: Date, minMagnitude: number): void {
  if (!Number.isFinite(start.getTime()) || !Number.isFinite(end.getTime())) {
    throw new InvalidRangeError(start, end, 'Invalid time range: start and end must be valid dates');
  }
  if (!Number.isFinite(minMagnitude)) {
    throw new InvalidRangeError(start, end, `Invalid minimum magnitude ${minMagnitude}`);
  }
  if (start.getTime() > end.getTime()) {
    throw new InvalidRangeError(start, end);
  }
}

function rangeDays(start: Date, end: Date): number {
  return Math.ceil((end.getTime() - start.getTime()) / MS_PER_DAY) + 1;
}

/**
 * Number of segments the frequency model calls for. Non-decreasing in the
 * span for a fixed magnitude.
 *
 * @throws {InvalidRangeError}
 */
export function estimateSegmentCount(
  start: Date,
  end: Date,
  minMagnitude: number,
  options: PlannerOptions = {}
): number {
  validateRange(start, end, minMagnitude);
  const rate = expectedDailyRate(minMagnitude, options.frequencyTable);
  const expected = rate * rangeDays(start, end);
  return Math.ceil(expected / (options.searchLimit ?? SEARCH_LIMIT));
}

/**
 * Split [start, end] into ascending, contiguous segments
 *
 * Consecutive segments are separated by one millisecond, the smallest step
 * a Date can take.
 *
 * @throws {InvalidRangeError} If start is after end or either bound is invalid
 */
export function planTimeSegments(
  start: Date,
  end: Date,
  minMagnitude: number,
  options: PlannerOptions = {}
): TimeSegment[] {
  const segmentCount = estimateSegmentCount(start, end, minMagnitude, options);
  if (segmentCount <= 1 || start.getTime() === end.getTime()) {
    return [{ start: new Date(start.getTime()), end: new Date(end.getTime()) }];
  }

  const stepMs = Math.ceil(rangeDays(start, end) / segmentCount) * MS_PER_DAY;
  const endMs = end.getTime();
  const segments: TimeSegment[] = [];

  let cursor = start.getTime();
  while (cursor <= endMs) {
    const segmentEnd = Math.min(cursor + stepMs, endMs);
    segments.push({ start: new Date(cursor), end: new Date(segmentEnd) });
    cursor = segmentEnd + SEGMENT_BOUNDARY_MS;
  }
  return segments;
}
