/**
 * Resolved Product
 *
 * One raw product submission plus the ordinal version the resolver assigned
 * it. Instances are created fresh on every resolver call.
 */

import {
  ArgumentConflictError,
  ContentNotFoundError,
  ProductNotSpecifiedError,
  PropertyNotFoundError,
} from '../core/errors.js';
import {
  isKnownProductType,
  parseProductProperties,
  typedPropertySubset,
  type KnownProductType,
  type ProductPropertiesOf,
  type TypedPropertySubset,
} from './product-properties.js';
import type { ContentEntry, PropertyValue, RawProduct } from './schemas.js';

/**
 * A content file reachable by URL
 */
export interface ContentMatch {
  readonly key: string;
  readonly fileName: string;
  readonly url: string;
  readonly entry: ContentEntry;
}

export class ResolvedProduct {
  readonly id: string;
  readonly type: string;
  readonly code: string;
  readonly source: string;
  readonly status: string;
  readonly preferredWeight: number;
  /** 1-based ordinal within this product type and source, by update time */
  readonly version: number;
  /** Update time, epoch milliseconds */
  readonly productTimestamp: number;
  readonly contents: Readonly<Record<string, ContentEntry>>;

  private readonly properties: Readonly<Record<string, PropertyValue>>;

  constructor(raw: RawProduct, version: number) {
    this.id = raw.id;
    this.type = raw.type;
    this.code = raw.code;
    this.source = raw.source;
    this.status = raw.status;
    this.preferredWeight = raw.preferredWeight;
    this.version = version;
    this.productTimestamp = raw.updateTime;
    this.contents = raw.contents;
    this.properties = raw.properties;
  }

  get name(): string {
    return this.type;
  }

  get updateTime(): Date {
    return new Date(this.productTimestamp);
  }

  get propertyNames(): string[] {
    return Object.keys(this.properties);
  }

  hasProperty(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.properties, key);
  }

  /**
   * @throws {PropertyNotFoundError}
   */
  getProperty(key: string): PropertyValue {
    const value = this.properties[key];
    if (value === undefined) {
      throw new PropertyNotFoundError(key, `${this.type} product ${this.code}`);
    }
    return value;
  }

  /**
   * Numeric property value, or null when absent or not a number
   */
  getNumber(key: string): number | null {
    const value = this.properties[key];
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
  }

  /**
   * Schema-known properties for this product type, converted
   */
  getTypedProperties(): TypedPropertySubset {
    return typedPropertySubset(this.type, this.properties);
  }

  /**
   * Full typed property view for a known product type
   *
   * @throws {ProductNotSpecifiedError} If this product is of another type
   */
  getPropertiesAs<K extends KnownProductType>(productType: K): ProductPropertiesOf<K> {
    if (this.type !== productType || !isKnownProductType(this.type)) {
      throw new ProductNotSpecifiedError(
        `Product ${this.code} is of type ${this.type}, not ${productType}`,
        [this.type]
      );
    }
    return parseProductProperties(productType, this.properties);
  }

  // ==========================================================================
  // Content lookup
  // ==========================================================================

  /**
   * File names (last URL path segment) of contents whose key ends in `pattern`
   */
  getContentsMatching(pattern: string): string[] {
    const regex = compileContentPattern(pattern);
    return this.contentsWithURL()
      .filter((content) => regex.test(content.key))
      .map((content) => content.fileName);
  }

  /**
   * Shortest file name whose content key matches `pattern`, or null
   */
  getContentName(pattern: string): string | null {
    return this.findShortestContent(pattern)?.fileName ?? null;
  }

  /**
   * URL of the shortest file whose content key matches `pattern`, or null
   */
  getContentURL(pattern: string): string | null {
    return this.findShortestContent(pattern)?.url ?? null;
  }

  /**
   * @throws {ContentNotFoundError}
   */
  requireContent(pattern: string): ContentMatch {
    const match = this.findShortestContent(pattern);
    if (!match) {
      throw new ContentNotFoundError(pattern, this.type);
    }
    return match;
  }

  findShortestContent(pattern: string): ContentMatch | null {
    const regex = compileContentPattern(pattern);
    let best: ContentMatch | null = null;
    for (const content of this.contentsWithURL()) {
      if (!regex.test(content.key)) continue;
      if (best === null || content.fileName.length < best.fileName.length) {
        best = content;
      }
    }
    return best;
  }

  private contentsWithURL(): ContentMatch[] {
    const matches: ContentMatch[] = [];
    for (const [key, entry] of Object.entries(this.contents)) {
      if (!entry.url) continue;
      matches.push({ key, fileName: fileNameFromURL(entry.url), url: entry.url, entry });
    }
    return matches;
  }

  toString(): string {
    const count = Object.keys(this.contents).length;
    return `Product ${this.type} from ${this.source} updated ${this.updateTime.toISOString()} containing ${count} content files.`;
  }
}

function compileContentPattern(pattern: string): RegExp {
  try {
    return new RegExp(`${pattern}$`);
  } catch (error) {
    throw new ArgumentConflictError(
      `Invalid content pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function fileNameFromURL(url: string): string {
  // relative URLs are split as plain paths
  const path = URL.canParse(url) ? new URL(url).pathname : url.split(/[?#]/)[0] ?? url;
  const segments = path.split('/');
  return segments[segments.length - 1] ?? '';
}
