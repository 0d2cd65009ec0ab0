/**
 * Country Bounds
 *
 * ComCat has no country filter. A country search is run as one rectangular
 * search per polygon part of the country outline, padded by a buffer
 * distance, and the union can then be trimmed to the buffered outline.
 *
 * Outlines come from a caller-supplied GeoJSON FeatureCollection (Natural
 * Earth admin-0 or similar) keyed by ADM0_A3 or ISO_A3.
 */

import { readFile } from 'node:fs/promises';
import { bbox, booleanPointInPolygon, buffer, point, polygon } from '@turf/turf';
import type { Feature, MultiPolygon, Polygon } from 'geojson';
import { z } from 'zod';
import { BUFFER_DISTANCE_KM, KM_PER_DEGREE } from '../core/constants.js';
import { ParsingError } from '../core/errors.js';
import { logger } from '../core/utils/logger.js';
import type { BoundingBox } from './query-params.js';

export type CountryFeature = Feature<Polygon | MultiPolygon>;

// ============================================================================
// Loading
// ============================================================================

const position = z.tuple([z.number(), z.number()]).rest(z.number());
const ring = z.array(position);

const CountryFeatureSchema = z.object({
  type: z.literal('Feature'),
  properties: z.record(z.unknown()).nullable(),
  geometry: z.discriminatedUnion('type', [
    z.object({ type: z.literal('Polygon'), coordinates: z.array(ring) }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ring)) }),
  ]),
});

const CountryCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
});

/**
 * Read a country FeatureCollection, keeping polygon features only
 *
 * @throws {ParsingError} If the file is not a GeoJSON FeatureCollection
 */
export async function loadCountryCollection(filePath: string): Promise<CountryFeature[]> {
  const text = await readFile(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParsingError(
      `Country file is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      { url: filePath }
    );
  }
  return parseCountryCollection(json, filePath);
}

export function parseCountryCollection(json: unknown, source = 'country collection'): CountryFeature[] {
  const collection = CountryCollectionSchema.safeParse(json);
  if (!collection.success) {
    throw new ParsingError('Country file must be a GeoJSON FeatureCollection', { url: source });
  }

  const features: CountryFeature[] = [];
  let skipped = 0;
  for (const candidate of collection.data.features) {
    const feature = CountryFeatureSchema.safeParse(candidate);
    if (feature.success) {
      features.push(feature.data);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    logger.debug('Skipped non-polygon country features', { source, skipped });
  }
  return features;
}

// ============================================================================
// Lookup
// ============================================================================

function countryCode(feature: CountryFeature): string | null {
  const code = feature.properties?.['ADM0_A3'] ?? feature.properties?.['ISO_A3'];
  return typeof code === 'string' ? code.toUpperCase() : null;
}

/**
 * Find a country by ISO 3166 alpha-3 code (case-insensitive)
 */
export function findCountry(features: readonly CountryFeature[], code: string): CountryFeature | null {
  const wanted = code.toUpperCase();
  return features.find((feature) => countryCode(feature) === wanted) ?? null;
}

/**
 * Outline split into single polygons
 */
function polygonParts(feature: CountryFeature): Feature<Polygon>[] {
  const geometry = feature.geometry;
  if (geometry.type === 'Polygon') {
    return [polygon(geometry.coordinates)];
  }
  return geometry.coordinates.map((coordinates) => polygon(coordinates));
}

/**
 * One padded box per polygon part
 *
 * Latitude is padded by bufferKm / 119.191 degrees; longitude by the same
 * amount scaled by cos(mean latitude of the padded box).
 */
export function getCountryBounds(
  feature: CountryFeature,
  bufferKm: number = BUFFER_DISTANCE_KM
): BoundingBox[] {
  const pad = bufferKm / KM_PER_DEGREE;
  return polygonParts(feature).map((part) => {
    const [west, south, east, north] = bbox(part);
    const minLatitude = south - pad;
    const maxLatitude = north + pad;
    const lonPad = pad * Math.cos((((minLatitude + maxLatitude) / 2) * Math.PI) / 180);
    return {
      minLatitude,
      maxLatitude,
      minLongitude: west - lonPad,
      maxLongitude: east + lonPad,
    };
  });
}

/**
 * Keep events inside the country outline buffered by `bufferKm`
 */
export function filterByCountry<T extends { readonly latitude: number; readonly longitude: number }>(
  events: readonly T[],
  feature: CountryFeature,
  bufferKm: number = BUFFER_DISTANCE_KM
): T[] {
  const parts = polygonParts(feature).map((part) => {
    const buffered = bufferKm > 0 ? buffer(part, bufferKm, { units: 'kilometers' }) : undefined;
    return buffered ?? part;
  });
  return events.filter((event) => {
    const location = point([event.longitude, event.latitude]);
    return parts.some((part) => booleanPointInPolygon(location, part));
  });
}
