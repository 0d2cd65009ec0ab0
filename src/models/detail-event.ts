/**
 * Detail Event
 *
 * Full per-event document: identity fields plus every product submission,
 * keyed by product type. Deleted submissions stay in the raw lists but are
 * invisible to hasProduct, getNumVersions and getProducts.
 */

import { ProductNotFoundError } from '../core/errors.js';
import { deepFreeze } from '../core/utils/freeze.js';
import {
  isDeleted,
  resolveProducts,
  type ProductSubmissions,
  type SourceSelector,
} from '../resolver/version-resolver.js';
import { EventBase } from './event-base.js';
import type { ResolvedProduct } from './product.js';
import { DetailFeatureSchema, parseDocument, type DetailFeature, type RawProduct } from './schemas.js';

export interface ProductQuery {
  /** 'preferred' (default), 'all', or a source code */
  readonly source?: SourceSelector;
  /** 'preferred' (default), 'first', 'last' or 'all' */
  readonly version?: string;
}

export class DetailEvent extends EventBase implements ProductSubmissions {
  /** URL the document was fetched from, when known */
  readonly detailUrl: string | null;

  private readonly feature: Readonly<DetailFeature>;
  private readonly products: Readonly<Record<string, readonly RawProduct[]>>;

  constructor(feature: DetailFeature, detailUrl?: string) {
    super(feature);
    this.detailUrl = detailUrl ?? feature.properties.detail ?? null;
    this.feature = deepFreeze(feature);
    this.products = this.feature.properties.products;
  }

  /**
   * Validate and wrap a detail document
   *
   * @throws {ParsingError}
   */
  static fromJSON(value: unknown, url?: string): DetailEvent {
    return new DetailEvent(parseDocument(DetailFeatureSchema, value, { what: 'event detail', url }), url);
  }

  /**
   * Product types in document order, including types whose every
   * submission is deleted
   */
  get productTypes(): string[] {
    return Object.keys(this.products);
  }

  getRawProducts(productType: string): readonly RawProduct[] {
    return this.products[productType] ?? [];
  }

  hasProduct(productType: string): boolean {
    return this.getRawProducts(productType).some((product) => !isDeleted(product));
  }

  /**
   * Number of live submissions of a product type
   *
   * @throws {ProductNotFoundError} When there are none
   */
  getNumVersions(productType: string): number {
    const count = this.getRawProducts(productType).filter((product) => !isDeleted(product)).length;
    if (count === 0) {
      throw new ProductNotFoundError(`Event ${this.id} has no product of type ${productType}`, productType);
    }
    return count;
  }

  /**
   * Resolve versions of a product type
   *
   * @throws {ProductNotFoundError}
   * @throws {UndefinedVersionError}
   */
  getProducts(productType: string, query: ProductQuery = {}): ResolvedProduct[] {
    return resolveProducts(this, productType, query.source ?? 'preferred', query.version ?? 'preferred');
  }

  toJSON(): Readonly<DetailFeature> {
    return this.feature;
  }
}
