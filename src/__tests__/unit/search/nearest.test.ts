/**
 * Nearest-event Matching Tests
 */

import { describe, it, expect } from 'vitest';
import { findNearestEvents, rankCandidates } from '../../../search/nearest.js';
import { CatalogClient } from '../../../search/catalog-client.js';
import type { Transport } from '../../../core/http-client.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { buildSummaryEvent, featureCollection, summaryFeature } from '../../utils/fixtures.js';

const ORIGIN_TIME = Date.parse('2024-01-01T00:00:30Z');
const observation = { time: new Date(ORIGIN_TIME), latitude: 35, longitude: -118 };

describe('rankCandidates', () => {
  const exact = buildSummaryEvent({ id: 'xx00000030', time: ORIGIN_TIME });
  const later = buildSummaryEvent({ id: 'xx00000031', time: ORIGIN_TIME + 8000 });
  const north = buildSummaryEvent({ id: 'xx00000032', time: ORIGIN_TIME, latitude: 36 });
  const east = buildSummaryEvent({ id: 'xx00000033', time: ORIGIN_TIME - 4000, longitude: -117 });

  it('should order by normalized distance', () => {
    const ranked = rankCandidates([north, east, later, exact], observation);
    expect(ranked.map((match) => match.event.id)).toEqual(['xx00000030', 'xx00000031', 'xx00000033', 'xx00000032']);
  });

  it('should scale time by the window and distance by the radius', () => {
    const [match] = rankCandidates([later], observation);
    expect(match?.timeDeltaSeconds).toBe(8);
    expect(match?.distanceKm).toBe(0);
    expect(match?.normalizedDistance).toBeCloseTo(0.5, 12);

    const [custom] = rankCandidates([later], { ...observation, windowSeconds: 4 });
    expect(custom?.normalizedDistance).toBeCloseTo(2, 12);
  });

  it('should measure great-circle distance and azimuth', () => {
    const [northMatch] = rankCandidates([north], observation);
    expect(northMatch?.distanceKm).toBeCloseTo(111.19, 1);
    expect(northMatch?.azimuth).toBeCloseTo(0, 6);
    expect(northMatch?.normalizedDistance).toBeCloseTo(1.1119, 3);

    const [eastMatch] = rankCandidates([east], observation);
    expect(eastMatch?.azimuth).toBeGreaterThan(89);
    expect(eastMatch?.azimuth).toBeLessThan(90);
    expect(eastMatch?.timeDeltaSeconds).toBe(4);
  });

  it('should report bearings to the west as positive degrees', () => {
    const west = buildSummaryEvent({ id: 'xx00000034', time: ORIGIN_TIME, longitude: -119 });
    const [match] = rankCandidates([west], observation);
    expect(match?.azimuth).toBeGreaterThan(270);
    expect(match?.azimuth).toBeLessThan(271);
  });

  it('should return nothing for no candidates', () => {
    expect(rankCandidates([], observation)).toEqual([]);
  });
});

describe('findNearestEvents', () => {
  it('should search a radius and window around the observation', async () => {
    const urls: string[] = [];
    const transport: Transport = {
      fetchJSON: async (url) => {
        urls.push(url);
        return featureCollection([
          summaryFeature({ id: 'xx00000041', time: ORIGIN_TIME + 10000, latitude: 35.2 }),
          summaryFeature({ id: 'xx00000040', time: ORIGIN_TIME + 1000 }),
        ]);
      },
      fetchBytes: async () => new Uint8Array(),
    };
    const client = new CatalogClient({ transport, logger: silentLogger });

    const matches = await findNearestEvents(client, observation);

    expect(matches.map((match) => match.event.id)).toEqual(['xx00000040', 'xx00000041']);
    const params = new URL(urls[0] ?? '').searchParams;
    expect(params.get('starttime')).toBe('2024-01-01T00:00:14');
    expect(params.get('endtime')).toBe('2024-01-01T00:00:46');
    expect(params.get('latitude')).toBe('35');
    expect(params.get('longitude')).toBe('-118');
    expect(params.get('maxradiuskm')).toBe('100');
  });
});
