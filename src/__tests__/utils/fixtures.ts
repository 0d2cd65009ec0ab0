/**
 * Fixture loading and document builders for unit tests
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseDocument, SearchResponseSchema, type RawProduct } from '../../models/schemas.js';
import { DetailEvent } from '../../models/detail-event.js';
import { SummaryEvent } from '../../models/summary-event.js';

const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export function fixturePath(name: string): string {
  return `${FIXTURES_DIR}${name}`;
}

export function loadFixture(name: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(fixturePath(name), 'utf-8'));
  return parsed;
}

export function loadDetailEvent(): DetailEvent {
  return DetailEvent.fromJSON(loadFixture('detail-event.json'), 'https://example.test/detail/xx00000001.geojson');
}

export function loadSearchEvents(): SummaryEvent[] {
  const response = parseDocument(SearchResponseSchema, loadFixture('search-response.json'), { what: 'search response' });
  return response.features.map((feature) => new SummaryEvent(feature));
}

// ============================================================================
// Builders
// ============================================================================

export function rawProduct(overrides: Partial<RawProduct> & Pick<RawProduct, 'source' | 'updateTime'>): RawProduct {
  return {
    id: `urn:test:${overrides.source}:${overrides.updateTime}`,
    type: 'origin',
    code: `${overrides.source}0001`,
    status: 'UPDATE',
    preferredWeight: 0,
    properties: {},
    contents: {},
    ...overrides,
  };
}

export interface FeatureOptions {
  readonly id: string;
  readonly time: number;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly depth?: number | null;
  readonly mag?: number | null;
  readonly products?: Record<string, RawProduct[]>;
  readonly detail?: string;
}

function eventProperties(options: FeatureOptions): Record<string, unknown> {
  return {
    mag: options.mag === undefined ? 4.5 : options.mag,
    place: `Near ${options.id}`,
    time: options.time,
    url: `https://earthquake.usgs.gov/earthquakes/eventpage/${options.id}`,
    detail: options.detail ?? `https://earthquake.usgs.gov/earthquakes/feed/v1.0/detail/${options.id}.geojson`,
    type: 'earthquake',
  };
}

function pointGeometry(options: FeatureOptions): Record<string, unknown> {
  return {
    type: 'Point',
    coordinates: [options.longitude ?? -118, options.latitude ?? 35, options.depth === undefined ? 10 : options.depth],
  };
}

export function summaryFeature(options: FeatureOptions): Record<string, unknown> {
  return {
    type: 'Feature',
    id: options.id,
    properties: eventProperties(options),
    geometry: pointGeometry(options),
  };
}

export function detailFeature(options: FeatureOptions): Record<string, unknown> {
  return {
    type: 'Feature',
    id: options.id,
    properties: { ...eventProperties(options), products: options.products ?? {} },
    geometry: pointGeometry(options),
  };
}

export function featureCollection(features: readonly Record<string, unknown>[]): Record<string, unknown> {
  return { type: 'FeatureCollection', metadata: { count: features.length }, features };
}

export function buildDetailEvent(options: FeatureOptions): DetailEvent {
  return DetailEvent.fromJSON(detailFeature(options));
}

export function buildSummaryEvent(options: FeatureOptions): SummaryEvent {
  return SummaryEvent.fromJSON(summaryFeature(options));
}
