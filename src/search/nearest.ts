/**
 * Nearest-event matching
 *
 * Finds the catalog events closest to an observed origin time and
 * location, ranking candidates inside a time window and search radius by
 * normalized distance sqrt((dt/window)² + (dist/radius)²).
 */

import { bearing, distance, point } from '@turf/turf';
import { addSeconds } from '../core/utils/time.js';
import type { SummaryEvent } from '../models/summary-event.js';
import type { CatalogClient, OperationOptions } from './catalog-client.js';

/** Default search radius, km */
export const DEFAULT_MATCH_RADIUS_KM = 100;

/** Default half-width of the time window, seconds */
export const DEFAULT_MATCH_WINDOW_SECONDS = 16;

export interface Observation {
  readonly time: Date;
  readonly latitude: number;
  readonly longitude: number;
  readonly radiusKm?: number;
  readonly windowSeconds?: number;
}

export interface EventMatch {
  readonly event: SummaryEvent;
  /** Absolute difference in origin time */
  readonly timeDeltaSeconds: number;
  /** Great-circle distance from the observation */
  readonly distanceKm: number;
  /** Degrees clockwise from north, observation to event */
  readonly azimuth: number;
  readonly normalizedDistance: number;
}

/**
 * Rank events against an observation, closest first
 */
export function rankCandidates(
  events: readonly SummaryEvent[],
  observation: Observation
): EventMatch[] {
  const radiusKm = observation.radiusKm ?? DEFAULT_MATCH_RADIUS_KM;
  const windowSeconds = observation.windowSeconds ?? DEFAULT_MATCH_WINDOW_SECONDS;
  const origin = point([observation.longitude, observation.latitude]);

  const matches = events.map((event): EventMatch => {
    const target = point([event.longitude, event.latitude]);
    const timeDeltaSeconds = Math.abs(event.time.getTime() - observation.time.getTime()) / 1000;
    const distanceKm = distance(origin, target, { units: 'kilometers' });
    const normalizedDistance = Math.sqrt(
      (timeDeltaSeconds / windowSeconds) ** 2 + (distanceKm / radiusKm) ** 2
    );
    return {
      event,
      timeDeltaSeconds,
      distanceKm,
      azimuth: (bearing(origin, target) + 360) % 360,
      normalizedDistance,
    };
  });

  return matches.sort((a, b) => a.normalizedDistance - b.normalizedDistance);
}

/**
 * Search around an observation and rank what comes back
 *
 * @returns Matches sorted by normalized distance; empty when nothing is found
 */
export async function findNearestEvents(
  client: CatalogClient,
  observation: Observation,
  options: OperationOptions = {}
): Promise<EventMatch[]> {
  const radiusKm = observation.radiusKm ?? DEFAULT_MATCH_RADIUS_KM;
  const windowSeconds = observation.windowSeconds ?? DEFAULT_MATCH_WINDOW_SECONDS;

  const events = await client.search(
    {
      startTime: addSeconds(observation.time, -windowSeconds),
      endTime: addSeconds(observation.time, windowSeconds),
      radius: {
        latitude: observation.latitude,
        longitude: observation.longitude,
        maxRadiusKm: radiusKm,
      },
    },
    options
  );
  return rankCandidates(events, observation);
}
