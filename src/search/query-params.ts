/**
 * Query Parameter Builder
 *
 * Translates SearchFilters into the canonical FDSN event parameter map and
 * back. Enforces:
 * - at most one spatial filter (bounds, radius or country); exactly one when
 *   the caller requires a spatial filter
 * - value ranges (latitude, radius, magnitude/depth/significance ordering,
 *   alert levels), validated with zod
 * - antimeridian wrap: minLongitude > 0 with maxLongitude < 0 becomes
 *   maxLongitude + 360
 *
 * `parseSearchParams(buildSearchParams(f))` reproduces `f` at second time
 * precision; a wrapped longitude stays wrapped.
 *
 * @module query-params
 */

import { z } from 'zod';
import { ArgumentConflictError } from '../core/errors.js';
import { formatSearchTime, parseTime } from '../core/utils/time.js';

// ============================================================================
// Types
// ============================================================================

export const ALERT_LEVELS = ['green', 'yellow', 'orange', 'red'] as const;
export type AlertLevel = (typeof ALERT_LEVELS)[number];

export const REVIEW_STATUSES = ['automatic', 'reviewed', 'all'] as const;
export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

export const ORDER_BY = ['time', 'time-asc', 'magnitude', 'magnitude-asc'] as const;
export type OrderBy = (typeof ORDER_BY)[number];

export interface BoundingBox {
  readonly minLatitude: number;
  readonly maxLatitude: number;
  readonly minLongitude: number;
  readonly maxLongitude: number;
}

export interface RadiusFilter {
  readonly latitude: number;
  readonly longitude: number;
  readonly maxRadiusKm: number;
}

export interface SearchFilters {
  readonly startTime?: Date;
  readonly endTime?: Date;
  readonly updatedAfter?: Date;
  readonly bounds?: BoundingBox;
  readonly radius?: RadiusFilter;
  /** ISO 3166 alpha-3 code; resolved to boxes by the caller */
  readonly country?: string;
  readonly minMagnitude?: number;
  readonly maxMagnitude?: number;
  readonly minDepth?: number;
  readonly maxDepth?: number;
  readonly minSig?: number;
  readonly maxSig?: number;
  readonly catalog?: string;
  readonly contributor?: string;
  readonly productType?: string;
  readonly productCode?: string;
  readonly eventType?: string;
  readonly alertLevel?: AlertLevel;
  readonly reviewStatus?: ReviewStatus;
  readonly orderBy?: OrderBy;
  readonly limit?: number;
}

/**
 * Parameter name → value, in canonical order
 */
export type SearchParams = Readonly<Record<string, string>>;

export interface BuildParamsOptions {
  /** Exactly one spatial filter must be present */
  readonly requireSpatial?: boolean;
  /** Count requests omit orderby and limit */
  readonly endpoint?: 'search' | 'count';
}

// ============================================================================
// Validation
// ============================================================================

const latitude = z.number().finite().min(-90, 'must be between -90 and 90').max(90, 'must be between -90 and 90');
const longitude = z.number().finite().min(-360, 'must be between -360 and 360').max(360, 'must be between -360 and 360');

function orderedPair(min: string, max: string) {
  return (value: Record<string, unknown>, ctx: z.RefinementCtx): void => {
    const low = value[min];
    const high = value[max];
    if (typeof low === 'number' && typeof high === 'number' && low > high) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [min], message: `must not exceed ${max}` });
    }
  };
}

const BoundingBoxSchema = z
  .object({
    minLatitude: latitude,
    maxLatitude: latitude,
    minLongitude: longitude,
    maxLongitude: longitude,
  })
  .superRefine(orderedPair('minLatitude', 'maxLatitude'));

const RadiusSchema = z.object({
  latitude,
  longitude,
  maxRadiusKm: z.number().finite().nonnegative('must not be negative'),
});

const SearchFiltersSchema = z
  .object({
    startTime: z.date().optional(),
    endTime: z.date().optional(),
    updatedAfter: z.date().optional(),
    bounds: BoundingBoxSchema.optional(),
    radius: RadiusSchema.optional(),
    country: z.string().regex(/^[A-Za-z]{3}$/, 'must be an ISO 3166 alpha-3 code').optional(),
    minMagnitude: z.number().finite().optional(),
    maxMagnitude: z.number().finite().optional(),
    minDepth: z.number().finite().optional(),
    maxDepth: z.number().finite().optional(),
    minSig: z.number().int().optional(),
    maxSig: z.number().int().optional(),
    catalog: z.string().min(1).optional(),
    contributor: z.string().min(1).optional(),
    productType: z.string().min(1).optional(),
    productCode: z.string().min(1).optional(),
    eventType: z.string().min(1).optional(),
    alertLevel: z.enum(ALERT_LEVELS).optional(),
    reviewStatus: z.enum(REVIEW_STATUSES).optional(),
    orderBy: z.enum(ORDER_BY).optional(),
    limit: z.number().int().positive().optional(),
  })
  .superRefine(orderedPair('minMagnitude', 'maxMagnitude'))
  .superRefine(orderedPair('minDepth', 'maxDepth'))
  .superRefine(orderedPair('minSig', 'maxSig'));

/**
 * @throws {ArgumentConflictError} Naming the first offending field
 */
export function validateSearchFilters(filters: SearchFilters): void {
  const result = SearchFiltersSchema.safeParse(filters);
  if (!result.success) {
    const issue = result.error.errors[0];
    const field = issue ? issue.path.join('.') : 'filters';
    throw new ArgumentConflictError(`Invalid search filter ${field}: ${issue?.message ?? 'invalid value'}`);
  }
}

// ============================================================================
// Building
// ============================================================================

/**
 * Shift maxLongitude by 360 when a box crosses the antimeridian
 */
export function normalizeLongitudeRange(minLongitude: number, maxLongitude: number): [number, number] {
  if (minLongitude > 0 && maxLongitude < 0) {
    return [minLongitude, maxLongitude + 360];
  }
  return [minLongitude, maxLongitude];
}

function countSpatialFilters(filters: SearchFilters): number {
  return [filters.bounds, filters.radius, filters.country].filter((value) => value !== undefined).length;
}

/**
 * Build the canonical parameter map for a search or count request
 *
 * @throws {ArgumentConflictError} On conflicting spatial filters or invalid values
 */
export function buildSearchParams(filters: SearchFilters, options: BuildParamsOptions = {}): SearchParams {
  const spatialCount = countSpatialFilters(filters);
  if (spatialCount > 1) {
    throw new ArgumentConflictError('Only one of bounds, radius or country may be specified');
  }
  if (options.requireSpatial && spatialCount === 0) {
    throw new ArgumentConflictError('One of bounds, radius or country must be specified');
  }
  validateSearchFilters(filters);

  const params: Record<string, string> = { format: 'geojson' };
  const set = (key: string, value: string | number | undefined): void => {
    if (value !== undefined) {
      params[key] = String(value);
    }
  };

  set('starttime', filters.startTime && formatSearchTime(filters.startTime));
  set('endtime', filters.endTime && formatSearchTime(filters.endTime));
  set('updatedafter', filters.updatedAfter && formatSearchTime(filters.updatedAfter));

  if (filters.bounds) {
    const [minLongitude, maxLongitude] = normalizeLongitudeRange(
      filters.bounds.minLongitude,
      filters.bounds.maxLongitude
    );
    set('minlatitude', filters.bounds.minLatitude);
    set('maxlatitude', filters.bounds.maxLatitude);
    set('minlongitude', minLongitude);
    set('maxlongitude', maxLongitude);
  }
  if (filters.radius) {
    set('latitude', filters.radius.latitude);
    set('longitude', filters.radius.longitude);
    set('maxradiuskm', filters.radius.maxRadiusKm);
  }

  set('minmagnitude', filters.minMagnitude);
  set('maxmagnitude', filters.maxMagnitude);
  set('mindepth', filters.minDepth);
  set('maxdepth', filters.maxDepth);
  set('minsig', filters.minSig);
  set('maxsig', filters.maxSig);
  set('catalog', filters.catalog);
  set('contributor', filters.contributor);
  set('producttype', filters.productType);
  set('productcode', filters.productCode);
  set('eventtype', filters.eventType);
  set('alertlevel', filters.alertLevel);
  set('reviewstatus', filters.reviewStatus);

  if (options.endpoint !== 'count') {
    set('orderby', filters.orderBy);
    set('limit', filters.limit);
  }
  return params;
}

/**
 * Append parameters to an endpoint URL
 */
export function toRequestURL(endpoint: string, params: SearchParams): string {
  return `${endpoint}?${new URLSearchParams(params).toString()}`;
}

// ============================================================================
// Parsing
// ============================================================================

function readNumber(params: SearchParams, key: string): number | undefined {
  const raw = params[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ArgumentConflictError(`Parameter ${key} is not a number: "${raw}"`);
  }
  return value;
}

function readTime(params: SearchParams, key: string): Date | undefined {
  const raw = params[key];
  return raw === undefined ? undefined : parseTime(raw);
}

function readEnum<T extends string>(params: SearchParams, key: string, allowed: readonly T[]): T | undefined {
  const raw = params[key];
  if (raw === undefined) return undefined;
  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    throw new ArgumentConflictError(`Parameter ${key} must be one of ${allowed.join(', ')}: "${raw}"`);
  }
  return match;
}

function readRequiredNumber(params: SearchParams, key: string): number {
  const value = readNumber(params, key);
  if (value === undefined) {
    throw new ArgumentConflictError(`Parameter ${key} is required`);
  }
  return value;
}

/**
 * Whether a group of parameters is present; partial groups are rejected
 */
function hasGroup(params: SearchParams, keys: readonly string[]): boolean {
  const present = keys.filter((key) => params[key] !== undefined);
  if (present.length > 0 && present.length !== keys.length) {
    throw new ArgumentConflictError(`Parameters ${keys.join(', ')} must be given together`);
  }
  return present.length > 0;
}

/**
 * Rebuild SearchFilters from a parameter map
 *
 * @throws {ArgumentConflictError} On malformed numbers, times or enum values
 */
export function parseSearchParams(params: SearchParams): SearchFilters {
  const hasBox = hasGroup(params, ['minlatitude', 'maxlatitude', 'minlongitude', 'maxlongitude']);
  const hasCircle = hasGroup(params, ['latitude', 'longitude', 'maxradiuskm']);

  const filters: SearchFilters = {
    startTime: readTime(params, 'starttime'),
    endTime: readTime(params, 'endtime'),
    updatedAfter: readTime(params, 'updatedafter'),
    bounds: hasBox
      ? {
          minLatitude: readRequiredNumber(params, 'minlatitude'),
          maxLatitude: readRequiredNumber(params, 'maxlatitude'),
          minLongitude: readRequiredNumber(params, 'minlongitude'),
          maxLongitude: readRequiredNumber(params, 'maxlongitude'),
        }
      : undefined,
    radius: hasCircle
      ? {
          latitude: readRequiredNumber(params, 'latitude'),
          longitude: readRequiredNumber(params, 'longitude'),
          maxRadiusKm: readRequiredNumber(params, 'maxradiuskm'),
        }
      : undefined,
    minMagnitude: readNumber(params, 'minmagnitude'),
    maxMagnitude: readNumber(params, 'maxmagnitude'),
    minDepth: readNumber(params, 'mindepth'),
    maxDepth: readNumber(params, 'maxdepth'),
    minSig: readNumber(params, 'minsig'),
    maxSig: readNumber(params, 'maxsig'),
    catalog: params['catalog'],
    contributor: params['contributor'],
    productType: params['producttype'],
    productCode: params['productcode'],
    eventType: params['eventtype'],
    alertLevel: readEnum(params, 'alertlevel', ALERT_LEVELS),
    reviewStatus: readEnum(params, 'reviewstatus', REVIEW_STATUSES),
    orderBy: readEnum(params, 'orderby', ORDER_BY),
    limit: readNumber(params, 'limit'),
  };
  return filters;
}
