/**
 * Shared CLI option parsing
 *
 * Argument parsers for commander plus the search-filter option set used by
 * `search`, `count` and `product`.
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError, type Command } from 'commander';
import { DEFAULT_SEARCH_DAYS } from '../../core/constants.js';
import { ArgumentConflictError } from '../../core/errors.js';
import { addDays, parseTime } from '../../core/utils/time.js';
import {
  ALERT_LEVELS,
  REVIEW_STATUSES,
  type AlertLevel,
  type ReviewStatus,
  type SearchFilters,
} from '../../search/query-params.js';

// ============================================================================
// Argument Parsers
// ============================================================================

export function parseNumber(value: string): number {
  const num = Number(value);
  if (value.trim() === '' || !Number.isFinite(num)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return num;
}

export function parseInteger(value: string): number {
  const num = parseNumber(value);
  if (!Number.isInteger(num)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return num;
}

/**
 * Parser for a comma-separated list of exactly `count` numbers
 */
export function parseNumberList(count: number): (value: string) => number[] {
  return (value: string) => {
    const parts = value.split(',').map((part) => part.trim());
    if (parts.length !== count) {
      throw new InvalidArgumentError(`Expected ${count} comma-separated numbers, got "${value}".`);
    }
    return parts.map(parseNumber);
  };
}

export function parseTimeOption(value: string): Date {
  try {
    return parseTime(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value: string) => {
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    return match;
  };
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// ============================================================================
// Search Filters
// ============================================================================

export interface FilterOptions {
  readonly startTime?: Date;
  readonly endTime?: Date;
  readonly after?: Date;
  readonly numDays?: number;
  /** lonmin, lonmax, latmin, latmax */
  readonly bounds?: number[];
  /** lat, lon, radius km */
  readonly radius?: number[];
  readonly country?: string;
  readonly buffer?: number;
  readonly magRange?: number[];
  readonly depthRange?: number[];
  readonly sigRange?: number[];
  readonly catalog?: string;
  readonly contributor?: string;
  readonly productType?: string;
  readonly eventType?: string;
  readonly alertLevel?: AlertLevel;
  readonly reviewStatus?: ReviewStatus;
  readonly limit?: number;
  readonly scenario?: boolean;
}

/**
 * Attach the search-filter options to a command
 */
export function addFilterOptions(command: Command): Command {
  return command
    .option('-s, --start-time <time>', 'Start time (YYYY-mm-dd, YYYY-mm-ddTHH:MM:SS[.ffffff])', parseTimeOption)
    .option('-e, --end-time <time>', 'End time (default: now)', parseTimeOption)
    .option('-t, --after <time>', 'Only events updated after this time', parseTimeOption)
    .option('--num-days <n>', `Days before the end time to search (default: ${DEFAULT_SEARCH_DAYS})`, parseInteger)
    .option('-b, --bounds <box>', 'Bounding box: lonmin,lonmax,latmin,latmax', parseNumberList(4))
    .option('-r, --radius <circle>', 'Search circle: lat,lon,km', parseNumberList(3))
    .option('--country <code>', 'ISO 3166 alpha-3 country code (needs a countries file)')
    .option('--buffer <km>', 'Distance around a country outline to include', parseNumber)
    .option('-m, --mag-range <range>', 'Magnitude range: min,max', parseNumberList(2))
    .option('--depth-range <range>', 'Depth range in km: min,max', parseNumberList(2))
    .option('--sig-range <range>', 'Significance range: min,max', parseNumberList(2))
    .option('-c, --catalog <source>', 'Source catalog (e.g. us, ci)')
    .option('--contributor <source>', 'Contributing network')
    .option('-p, --product-type <type>', 'Only events with this product type')
    .option('--event-type <type>', 'Event type (e.g. earthquake, quarry blast)')
    .option('--alert-level <level>', `PAGER alert level: ${ALERT_LEVELS.join('|')}`, parseChoice(ALERT_LEVELS))
    .option('--review-status <status>', `Review status: ${REVIEW_STATUSES.join('|')}`, parseChoice(REVIEW_STATUSES))
    .option('--limit <n>', 'Maximum events per request', parseInteger)
    .option('--scenario', 'Search the scenario catalog');
}

function pair(values: readonly number[] | undefined): [number, number] | [undefined, undefined] {
  if (values === undefined) return [undefined, undefined];
  const [first, second] = values;
  if (first === undefined || second === undefined) return [undefined, undefined];
  return [first, second];
}

/**
 * Turn parsed filter options into library search filters
 *
 * @throws {ArgumentConflictError} When --num-days is combined with --start-time
 */
export function filtersFromOptions(options: FilterOptions, now: Date = new Date()): SearchFilters {
  if (options.numDays !== undefined && options.startTime !== undefined) {
    throw new ArgumentConflictError('--num-days cannot be combined with --start-time');
  }

  const endTime = options.endTime ?? now;
  const startTime = options.startTime ?? addDays(endTime, -(options.numDays ?? DEFAULT_SEARCH_DAYS));

  const [minMagnitude, maxMagnitude] = pair(options.magRange);
  const [minDepth, maxDepth] = pair(options.depthRange);
  const [minSig, maxSig] = pair(options.sigRange);

  let bounds: SearchFilters['bounds'];
  if (options.bounds) {
    const [minLongitude, maxLongitude, minLatitude, maxLatitude] = options.bounds;
    if (
      minLongitude !== undefined &&
      maxLongitude !== undefined &&
      minLatitude !== undefined &&
      maxLatitude !== undefined
    ) {
      bounds = { minLongitude, maxLongitude, minLatitude, maxLatitude };
    }
  }

  let radius: SearchFilters['radius'];
  if (options.radius) {
    const [latitude, longitude, maxRadiusKm] = options.radius;
    if (latitude !== undefined && longitude !== undefined && maxRadiusKm !== undefined) {
      radius = { latitude, longitude, maxRadiusKm };
    }
  }

  return {
    startTime,
    endTime,
    updatedAfter: options.after,
    bounds,
    radius,
    country: options.country,
    minMagnitude,
    maxMagnitude,
    minDepth,
    maxDepth,
    minSig,
    maxSig,
    catalog: options.catalog,
    contributor: options.contributor,
    productType: options.productType,
    eventType: options.eventType,
    alertLevel: options.alertLevel,
    reviewStatus: options.reviewStatus,
    limit: options.limit,
  };
}
