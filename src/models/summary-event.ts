/**
 * Summary Event
 *
 * Read-only view of one feature from a search response. Upgrading to a
 * DetailEvent means fetching `detailUrl`; see CatalogClient.getDetailEvent.
 */

import { deepFreeze } from '../core/utils/freeze.js';
import type { Row } from '../tabular/types.js';
import { EventBase } from './event-base.js';
import { parseDocument, SummaryFeatureSchema, type SummaryFeature } from './schemas.js';

export const SUMMARY_COLUMNS = [
  'id',
  'time',
  'location',
  'latitude',
  'longitude',
  'depth',
  'magnitude',
  'alert',
  'url',
  'eventtype',
  'significance',
] as const;

export class SummaryEvent extends EventBase {
  /** URL of the full detail document */
  readonly detailUrl: string | null;

  private readonly feature: Readonly<SummaryFeature>;

  constructor(feature: SummaryFeature) {
    super(feature);
    this.detailUrl = feature.properties.detail ?? null;
    this.feature = deepFreeze(feature);
  }

  /**
   * Validate and wrap an untyped feature
   *
   * @throws {ParsingError}
   */
  static fromJSON(value: unknown, url?: string): SummaryEvent {
    return new SummaryEvent(parseDocument(SummaryFeatureSchema, value, { what: 'event summary', url }));
  }

  /**
   * Whether the `types` property lists this product type
   */
  hasProduct(productType: string): boolean {
    return this.summaryProductTypes.includes(productType);
  }

  toRecord(): Row {
    return {
      id: this.id,
      time: this.time,
      location: this.location,
      latitude: this.latitude,
      longitude: this.longitude,
      depth: this.depth,
      magnitude: this.magnitude,
      alert: this.alert,
      url: this.url,
      eventtype: this.eventType,
      significance: this.significance,
    };
  }

  toJSON(): Readonly<SummaryFeature> {
    return this.feature;
  }
}
