/**
 * Identity fields and property access shared by summary and detail events
 */

import { PropertyNotFoundError } from '../core/errors.js';
import type { PropertyValue } from './schemas.js';

/**
 * The feature fields both event documents carry
 */
export interface EventFeature {
  readonly id: string;
  readonly properties: {
    readonly time: number;
    readonly mag?: number | null;
    readonly place?: string | null;
    readonly url?: string;
    readonly alert?: string | null;
    readonly sig?: number | null;
    readonly types?: string;
    readonly magType?: string | null;
    readonly type?: string;
    readonly [key: string]: unknown;
  };
  readonly geometry: {
    readonly coordinates: readonly [number, number, ...(number | null)[]];
  };
}

export abstract class EventBase {
  readonly id: string;
  readonly time: Date;
  readonly latitude: number;
  readonly longitude: number;
  /** km; NaN when the document has no depth */
  readonly depth: number;
  readonly magnitude: number | null;
  readonly magType: string | null;
  readonly location: string;
  readonly url: string;
  readonly alert: string | null;
  readonly eventType: string;
  readonly significance: number | null;

  private readonly scalars: Readonly<Record<string, PropertyValue>>;

  protected constructor(feature: EventFeature) {
    const props = feature.properties;
    const [longitude, latitude, depth] = feature.geometry.coordinates;

    this.id = feature.id;
    this.time = new Date(props.time);
    this.latitude = latitude;
    this.longitude = longitude;
    this.depth = depth ?? Number.NaN;
    this.magnitude = props.mag ?? null;
    this.magType = props.magType ?? null;
    this.location = props.place ?? '';
    this.url = props.url ?? '';
    this.alert = props.alert ?? null;
    this.eventType = props.type ?? 'earthquake';
    this.significance = props.sig ?? null;

    const scalars: Record<string, PropertyValue> = {};
    for (const [key, value] of Object.entries(props)) {
      if (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
      ) {
        scalars[key] = value;
      }
    }
    this.scalars = Object.freeze(scalars);
  }

  get propertyNames(): string[] {
    return Object.keys(this.scalars);
  }

  hasProperty(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.scalars, key);
  }

  /**
   * @throws {PropertyNotFoundError}
   */
  getProperty(key: string): PropertyValue {
    const value = this.scalars[key];
    if (value === undefined) {
      throw new PropertyNotFoundError(key, `event ${this.id}`);
    }
    return value;
  }

  /**
   * Product types named in the comma-separated `types` property
   */
  get summaryProductTypes(): string[] {
    const types = this.scalars['types'];
    if (typeof types !== 'string') return [];
    return types.split(',').filter((type) => type.length > 0);
  }

  toString(): string {
    const mag = this.magnitude === null ? 'nan' : this.magnitude.toFixed(1);
    return `${this.id} ${this.time.toISOString()} (${this.latitude.toFixed(3)},${this.longitude.toFixed(3)}) ${this.depth.toFixed(1)} km M${mag}`;
  }
}
