/**
 * Catalog Client
 *
 * Search execution over the time segmentation planner:
 * - search / searchWithReport: one request per planned segment, in
 *   ascending order, each ordered time-asc; results concatenated
 * - count: the same segmentation against the count endpoint, summed
 * - searchCountry: one search per country box, merged by event id
 * - getEventById / getDetailEvent: detail documents
 *
 * Segment bounds go out at second precision, widened outward, so
 * neighbouring requests share their boundary second. search drops the
 * repeated events; count sums per segment and can count an event that falls
 * exactly on a boundary twice.
 *
 * A segment that fails after the transport's retry fails the whole
 * operation; partial results are never returned. The AbortSignal is
 * checked between segments and handed to the transport.
 *
 * USAGE:
 * ```typescript
 * const client = new CatalogClient();
 * const events = await client.search({
 *   startTime: new Date('2024-01-01T00:00:00Z'),
 *   minMagnitude: 5,
 * });
 * const detail = await client.getDetailEvent(events[0]);
 * ```
 */

import { DEFAULT_HOST, DEFAULT_SEARCH_DAYS, SEARCH_LIMIT, getEndpoints, type EndpointSet } from '../core/constants.js';
import { ArgumentConflictError, throwIfAborted } from '../core/errors.js';
import { getHTTPClient, type Transport } from '../core/http-client.js';
import { addDays, ceilToSecond, floorToSecond } from '../core/utils/time.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { DetailEvent } from '../models/detail-event.js';
import { CountResponseSchema, parseDocument, SearchResponseSchema } from '../models/schemas.js';
import { SummaryEvent } from '../models/summary-event.js';
import { buildSearchParams, toRequestURL, type BoundingBox, type SearchFilters } from './query-params.js';
import { planTimeSegments, type FrequencyTable, type TimeSegment } from './time-segments.js';

// ============================================================================
// Types
// ============================================================================

export interface CatalogClientOptions {
  readonly transport?: Transport;
  /** ComCat host (default earthquake.usgs.gov) */
  readonly host?: string;
  /** Overrides the endpoints derived from `host` */
  readonly endpoints?: EndpointSet;
  readonly logger?: Logger;
  readonly frequencyTable?: FrequencyTable;
  /** Server ceiling on events per request (default 20000) */
  readonly searchLimit?: number;
  /** Clock used for default time ranges */
  readonly now?: () => Date;
}

export interface OperationOptions {
  readonly signal?: AbortSignal;
}

export interface SearchOptions extends OperationOptions {
  /** Search the scenario catalog */
  readonly scenario?: boolean;
}

export interface DetailOptions extends OperationOptions {
  /** Also return superseded product versions (implies deleted) */
  readonly includeSuperseded?: boolean;
  /** Also return deleted product versions */
  readonly includeDeleted?: boolean;
  readonly scenario?: boolean;
  /** Restrict an id lookup to one catalog */
  readonly catalog?: string;
}

export interface SegmentReport {
  readonly segment: TimeSegment;
  readonly url: string;
  readonly count: number;
  /** Result count reached the request limit: events may be missing */
  readonly truncated: boolean;
}

export interface SearchReport {
  readonly events: SummaryEvent[];
  readonly segments: SegmentReport[];
}

/**
 * Widen a segment to whole seconds: the wire format drops milliseconds
 */
function wireRange(segment: TimeSegment): { startTime: Date; endTime: Date } {
  return { startTime: floorToSecond(segment.start), endTime: ceilToSecond(segment.end) };
}

// ============================================================================
// Client
// ============================================================================

export class CatalogClient {
  private readonly transport: Transport;
  private readonly endpoints: EndpointSet;
  private readonly logger: Logger;
  private readonly frequencyTable: FrequencyTable | undefined;
  private readonly searchLimit: number;
  private readonly now: () => Date;

  constructor(options: CatalogClientOptions = {}) {
    this.transport = options.transport ?? getHTTPClient();
    this.endpoints = options.endpoints ?? getEndpoints(options.host ?? DEFAULT_HOST);
    this.logger = options.logger ?? createLogger({ module: 'catalog' });
    this.frequencyTable = options.frequencyTable;
    this.searchLimit = options.searchLimit ?? SEARCH_LIMIT;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Search for events, splitting the time range to stay under the limit
   *
   * @throws {ArgumentConflictError} For invalid or conflicting filters
   * @throws {InvalidRangeError} If startTime is after endTime
   * @throws {ConnectionError} If any segment request fails
   * @throws {CancelledError} If the signal aborts
   */
  async search(filters: SearchFilters, options: SearchOptions = {}): Promise<SummaryEvent[]> {
    const report = await this.searchWithReport(filters, options);
    return report.events;
  }

  /**
   * Search, also reporting each segment's result count and truncation
   */
  async searchWithReport(filters: SearchFilters, options: SearchOptions = {}): Promise<SearchReport> {
    this.rejectCountryFilter(filters);
    const segments = this.planSegments(filters);
    const limit = Math.min(filters.limit ?? this.searchLimit, this.searchLimit);
    const endpoint = options.scenario ? this.endpoints.scenarioSearch : this.endpoints.search;

    const events: SummaryEvent[] = [];
    const seen = new Set<string>();
    const reports: SegmentReport[] = [];

    for (const [index, segment] of segments.entries()) {
      throwIfAborted(options.signal, 'Search');

      const params = buildSearchParams({
        ...filters,
        ...wireRange(segment),
        orderBy: 'time-asc',
        limit,
      });
      const url = toRequestURL(endpoint, params);
      this.logger.debug('Searching segment', { segment: index + 1, of: segments.length, url });

      const document = await this.transport.fetchJSON(url, { signal: options.signal });
      const response = parseDocument(SearchResponseSchema, document, { what: 'search response', url });

      const truncated = response.features.length >= limit;
      if (truncated) {
        this.logger.warn('Segment returned the maximum number of events; results may be incomplete', {
          start: segment.start.toISOString(),
          end: segment.end.toISOString(),
          limit,
        });
      }
      reports.push({ segment, url, count: response.features.length, truncated });

      for (const feature of response.features) {
        // an event on a shared boundary second is returned by both segments
        if (seen.has(feature.id)) continue;
        seen.add(feature.id);
        events.push(new SummaryEvent(feature));
      }
    }

    this.logger.info('Search complete', { events: events.length, segments: segments.length });
    return { events, segments: reports };
  }

  /**
   * Count matching events, summing per-segment counts
   *
   * An event exactly on a shared boundary second is counted by both segments.
   */
  async count(filters: SearchFilters, options: OperationOptions = {}): Promise<number> {
    this.rejectCountryFilter(filters);
    let total = 0;
    for (const segment of this.planSegments(filters)) {
      throwIfAborted(options.signal, 'Count');
      total += await this.countRange({ ...filters, ...wireRange(segment) }, options);
    }
    return total;
  }

  /**
   * Whether a single unsegmented search would exceed the server limit
   */
  async exceedsSearchLimit(filters: SearchFilters, options: OperationOptions = {}): Promise<boolean> {
    this.rejectCountryFilter(filters);
    const { start, end } = this.resolveRange(filters);
    const total = await this.countRange({ ...filters, startTime: start, endTime: end }, options);
    return total > this.searchLimit;
  }

  /**
   * Search each country box and merge, de-duplicated by id, by time ascending
   */
  async searchCountry(
    filters: SearchFilters,
    boxes: readonly BoundingBox[],
    options: SearchOptions = {}
  ): Promise<SummaryEvent[]> {
    if (filters.bounds || filters.radius) {
      throw new ArgumentConflictError('Country searches cannot also specify bounds or radius');
    }

    const merged = new Map<string, SummaryEvent>();
    for (const bounds of boxes) {
      throwIfAborted(options.signal, 'Country search');
      const events = await this.search({ ...filters, country: undefined, bounds }, options);
      for (const event of events) {
        if (!merged.has(event.id)) {
          merged.set(event.id, event);
        }
      }
    }
    return [...merged.values()].sort((a, b) => a.time.getTime() - b.time.getTime());
  }

  /**
   * Fetch the detail document for an event id
   *
   * @throws {ArgumentConflictError} If both includeSuperseded and includeDeleted are set
   */
  async getEventById(id: string, options: DetailOptions = {}): Promise<DetailEvent> {
    const url = this.detailURL(id, null, options);
    return this.fetchDetail(url, options);
  }

  /**
   * Upgrade a summary to its detail document
   */
  async getDetailEvent(summary: SummaryEvent, options: DetailOptions = {}): Promise<DetailEvent> {
    const url = this.detailURL(summary.id, summary.detailUrl, options);
    return this.fetchDetail(url, options);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private resolveRange(filters: SearchFilters): { start: Date; end: Date } {
    const end = filters.endTime ?? this.now();
    const start = filters.startTime ?? addDays(end, -DEFAULT_SEARCH_DAYS);
    return { start, end };
  }

  private planSegments(filters: SearchFilters): TimeSegment[] {
    const { start, end } = this.resolveRange(filters);
    return planTimeSegments(start, end, filters.minMagnitude ?? 0, {
      frequencyTable: this.frequencyTable,
      searchLimit: this.searchLimit,
    });
  }

  private async countRange(filters: SearchFilters, options: OperationOptions): Promise<number> {
    const url = toRequestURL(this.endpoints.count, buildSearchParams(filters, { endpoint: 'count' }));
    const document = await this.transport.fetchJSON(url, { signal: options.signal });
    return parseDocument(CountResponseSchema, document, { what: 'count response', url }).count;
  }

  private rejectCountryFilter(filters: SearchFilters): void {
    if (filters.country !== undefined) {
      throw new ArgumentConflictError(
        `Country ${filters.country} must be resolved to bounding boxes; use searchCountry`
      );
    }
  }

  private detailURL(id: string, detailUrl: string | null, options: DetailOptions): string {
    const superseded = options.includeSuperseded ?? false;
    const deleted = options.includeDeleted ?? false;
    if (superseded && deleted) {
      throw new ArgumentConflictError('includeDeleted and includeSuperseded cannot be used together');
    }

    if (!superseded && !deleted && !options.scenario && !options.catalog) {
      return detailUrl ?? this.endpoints.detailTemplate.replace('[EVENTID]', encodeURIComponent(id));
    }

    const endpoint = options.scenario ? this.endpoints.scenarioSearch : this.endpoints.search;
    const params: Record<string, string> = { format: 'geojson', eventid: id };
    if (options.catalog) {
      params['catalog'] = options.catalog;
    }
    params['includesuperseded'] = String(superseded);
    params['includedeleted'] = String(deleted);
    return toRequestURL(endpoint, params);
  }

  private async fetchDetail(url: string, options: OperationOptions): Promise<DetailEvent> {
    throwIfAborted(options.signal, 'Detail fetch');
    const document = await this.transport.fetchJSON(url, { signal: options.signal });
    return DetailEvent.fromJSON(document, url);
  }
}
