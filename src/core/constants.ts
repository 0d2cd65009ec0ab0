/**
 * ComCat endpoint templates and request policy constants
 */

export const LIBRARY_VERSION = '0.4.0';

/** Default ComCat host */
export const DEFAULT_HOST = 'earthquake.usgs.gov';

/** Maximum number of events ComCat returns for one query */
export const SEARCH_LIMIT = 20_000;

/** Per-request timeout */
export const REQUEST_TIMEOUT_MS = 60_000;

/** Wait before the single retry on 503 */
export const RETRY_WAIT_MS = 3_000;

/** Default search window when no start time is given */
export const DEFAULT_SEARCH_DAYS = 30;

/** Padding around a country outline, km */
export const BUFFER_DISTANCE_KM = 100;

/** Mean kilometres per degree used when padding country boxes */
export const KM_PER_DEGREE = 119.191;

export const MS_PER_DAY = 86_400_000;

/**
 * Endpoint URLs for a host
 */
export interface EndpointSet {
  readonly search: string;
  readonly count: string;
  readonly scenarioSearch: string;
  /** Detail feed, `[EVENTID]` is replaced by the event id */
  readonly detailTemplate: string;
}

export function getEndpoints(host: string = DEFAULT_HOST): EndpointSet {
  return {
    search: `https://${host}/fdsnws/event/1/query`,
    count: `https://${host}/fdsnws/event/1/count`,
    scenarioSearch: `https://${host}/fdsnws/scenario/1/query`,
    detailTemplate: `https://${host}/earthquakes/feed/v1.0/detail/[EVENTID].geojson`,
  };
}

/**
 * Product types with a dedicated property schema and history support
 */
export const PRODUCT_TYPES = [
  'dyfi',
  'finite-fault',
  'focal-mechanism',
  'ground-failure',
  'losspager',
  'moment-tensor',
  'oaf',
  'origin',
  'phase-data',
  'shakemap',
] as const;
