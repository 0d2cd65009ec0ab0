/**
 * Query Parameter Builder Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildSearchParams,
  normalizeLongitudeRange,
  parseSearchParams,
  toRequestURL,
  validateSearchFilters,
  type SearchFilters,
} from '../../../search/query-params.js';
import { ArgumentConflictError } from '../../../core/errors.js';

const START = new Date('2024-01-01T00:00:00.000Z');
const END = new Date('2024-01-08T12:30:45.000Z');

describe('normalizeLongitudeRange', () => {
  it('should shift the maximum across the antimeridian', () => {
    expect(normalizeLongitudeRange(179, -179)).toEqual([179, 181]);
  });

  it('should leave ordinary ranges alone', () => {
    expect(normalizeLongitudeRange(-120, -110)).toEqual([-120, -110]);
    expect(normalizeLongitudeRange(-10, 10)).toEqual([-10, 10]);
  });
});

describe('buildSearchParams', () => {
  it('should emit keys in canonical order', () => {
    const params = buildSearchParams({
      limit: 500,
      orderBy: 'time-asc',
      minMagnitude: 4.5,
      radius: { latitude: 35.5, longitude: -117.25, maxRadiusKm: 50 },
      endTime: END,
      startTime: START,
      catalog: 'us',
      eventType: 'earthquake',
    });

    expect(Object.keys(params)).toEqual([
      'format',
      'starttime',
      'endtime',
      'latitude',
      'longitude',
      'maxradiuskm',
      'minmagnitude',
      'catalog',
      'eventtype',
      'orderby',
      'limit',
    ]);
    expect(params).toEqual({
      format: 'geojson',
      starttime: '2024-01-01T00:00:00',
      endtime: '2024-01-08T12:30:45',
      latitude: '35.5',
      longitude: '-117.25',
      maxradiuskm: '50',
      minmagnitude: '4.5',
      catalog: 'us',
      eventtype: 'earthquake',
      orderby: 'time-asc',
      limit: '500',
    });
  });

  it('should wrap a bounding box that crosses the antimeridian', () => {
    const params = buildSearchParams({
      bounds: { minLatitude: -20, maxLatitude: -10, minLongitude: 179, maxLongitude: -179 },
    });
    expect(params['minlongitude']).toBe('179');
    expect(params['maxlongitude']).toBe('181');
  });

  it('should leave orderby and limit out of count requests', () => {
    const params = buildSearchParams({ minMagnitude: 6, orderBy: 'magnitude', limit: 10 }, { endpoint: 'count' });
    expect(params).toEqual({ format: 'geojson', minmagnitude: '6' });
  });

  it('should reject more than one spatial filter', () => {
    expect(() =>
      buildSearchParams({
        bounds: { minLatitude: 0, maxLatitude: 1, minLongitude: 0, maxLongitude: 1 },
        radius: { latitude: 0, longitude: 0, maxRadiusKm: 10 },
      })
    ).toThrow('Only one of bounds, radius or country may be specified');
  });

  it('should require a spatial filter when asked to', () => {
    expect(() => buildSearchParams({ minMagnitude: 5 }, { requireSpatial: true })).toThrow(
      'One of bounds, radius or country must be specified'
    );
  });

  it('should name the offending field for invalid values', () => {
    expect(() => buildSearchParams({ radius: { latitude: 91, longitude: 0, maxRadiusKm: 10 } })).toThrow(
      'Invalid search filter radius.latitude: must be between -90 and 90'
    );
    expect(() => buildSearchParams({ radius: { latitude: 10, longitude: 0, maxRadiusKm: -1 } })).toThrow(
      'Invalid search filter radius.maxRadiusKm: must not be negative'
    );
    expect(() => buildSearchParams({ minMagnitude: 6, maxMagnitude: 5 })).toThrow(
      'Invalid search filter minMagnitude: must not exceed maxMagnitude'
    );
  });
});

describe('validateSearchFilters', () => {
  it('should reject an unknown alert level', () => {
    // filters arriving from untyped input
    const filters: SearchFilters = {};
    Object.defineProperty(filters, 'alertLevel', { value: 'purple', enumerable: true });
    expect(() => validateSearchFilters(filters)).toThrow(ArgumentConflictError);
    expect(() => validateSearchFilters(filters)).toThrow('Invalid search filter alertLevel:');
  });

  it('should reject a malformed country code', () => {
    expect(() => validateSearchFilters({ country: 'US' })).toThrow(
      'Invalid search filter country: must be an ISO 3166 alpha-3 code'
    );
  });

  it('should accept an empty filter set', () => {
    expect(() => validateSearchFilters({})).not.toThrow();
  });
});

describe('parseSearchParams', () => {
  it('should reproduce the filters it was built from', () => {
    const filters: SearchFilters = {
      startTime: START,
      endTime: END,
      updatedAfter: new Date('2024-01-05T00:00:00.000Z'),
      bounds: { minLatitude: 32, maxLatitude: 36.5, minLongitude: -121, maxLongitude: -114 },
      minMagnitude: 2.5,
      maxMagnitude: 7,
      minDepth: 0,
      maxDepth: 35,
      minSig: 100,
      maxSig: 900,
      catalog: 'ci',
      contributor: 'ci',
      productType: 'shakemap',
      productCode: 'ci12345',
      eventType: 'earthquake',
      alertLevel: 'yellow',
      reviewStatus: 'reviewed',
      orderBy: 'magnitude',
      limit: 1000,
    };

    expect(parseSearchParams(buildSearchParams(filters))).toEqual(filters);
  });

  it('should keep a wrapped longitude denormalized', () => {
    const parsed = parseSearchParams(
      buildSearchParams({ bounds: { minLatitude: -20, maxLatitude: -10, minLongitude: 179, maxLongitude: -179 } })
    );
    expect(parsed.bounds).toEqual({ minLatitude: -20, maxLatitude: -10, minLongitude: 179, maxLongitude: 181 });
  });

  it('should round-trip a radius filter', () => {
    const filters: SearchFilters = { radius: { latitude: -33.45, longitude: -70.66, maxRadiusKm: 250 } };
    expect(parseSearchParams(buildSearchParams(filters))).toEqual(filters);
  });

  it('should reject a partial bounding box', () => {
    expect(() => parseSearchParams({ minlatitude: '1', maxlatitude: '2' })).toThrow(
      'Parameters minlatitude, maxlatitude, minlongitude, maxlongitude must be given together'
    );
  });

  it('should reject malformed numbers and enum values', () => {
    expect(() => parseSearchParams({ minmagnitude: 'big' })).toThrow('Parameter minmagnitude is not a number: "big"');
    expect(() => parseSearchParams({ reviewstatus: 'maybe' })).toThrow(
      'Parameter reviewstatus must be one of automatic, reviewed, all: "maybe"'
    );
  });
});

describe('toRequestURL', () => {
  it('should encode parameters onto the endpoint', () => {
    const url = toRequestURL('https://earthquake.usgs.gov/fdsnws/event/1/query', {
      format: 'geojson',
      starttime: '2024-01-01T00:00:00',
      eventtype: 'quarry blast',
    });
    expect(url).toBe(
      'https://earthquake.usgs.gov/fdsnws/event/1/query?format=geojson&starttime=2024-01-01T00%3A00%3A00&eventtype=quarry+blast'
    );
  });
});
