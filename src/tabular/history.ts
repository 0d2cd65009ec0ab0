/**
 * Event history
 *
 * One row per product version across product types, sorted by update time,
 * so the life of an event (first origin, shakemap revisions, PAGER alerts)
 * reads top to bottom.
 */

import { PRODUCT_TYPES } from '../core/constants.js';
import type { DetailEvent } from '../models/detail-event.js';
import type { ResolvedProduct } from '../models/product.js';
import type { Row } from './types.js';

export const HISTORY_COLUMNS = [
  'Product',
  'Authoritative Event ID',
  'Code',
  'Associated',
  'Product Source',
  'Product Version',
  'Update Time',
  'Elapsed (min)',
  'URL',
  'Comment',
  'Description',
] as const;

/** Separates key#value pairs in the Description column */
export const DESCRIPTION_SEPARATOR = '|';
export const DESCRIPTION_PAIR_SEPARATOR = '#';

// most representative content file per product type
const REPRESENTATIVE_CONTENT: Readonly<Record<string, string>> = {
  origin: 'quakeml.xml',
  'phase-data': 'quakeml.xml',
  'moment-tensor': 'quakeml.xml',
  'focal-mechanism': 'quakeml.xml',
  shakemap: 'grid.xml',
  losspager: 'onepager.pdf',
  dyfi: 'cdi_zip.xml',
};

function productCode(product: ResolvedProduct): string {
  const source = product.hasProperty('eventsource') ? product.getProperty('eventsource') : null;
  const code = product.hasProperty('eventsourcecode') ? product.getProperty('eventsourcecode') : null;
  if (typeof source === 'string' && typeof code === 'string') {
    return `${source}${code}`;
  }
  return product.code;
}

function representativeURL(product: ResolvedProduct): string {
  const pattern = REPRESENTATIVE_CONTENT[product.type];
  const preferred = pattern === undefined ? null : product.getContentURL(pattern);
  if (preferred !== null) return preferred;
  for (const entry of Object.values(product.contents)) {
    if (entry.url) return entry.url;
  }
  return '';
}

/**
 * Render typed properties as `key#value|key#value`
 */
export function describeProduct(product: ResolvedProduct): string {
  return Object.entries(product.getTypedProperties())
    .map(([key, value]) => `${key}${DESCRIPTION_PAIR_SEPARATOR}${value}`)
    .join(DESCRIPTION_SEPARATOR);
}

function historyRow(detail: DetailEvent, product: ResolvedProduct, associatedIds: readonly string[]): Row {
  const code = productCode(product);
  const comment = product.hasProperty('comment') ? product.getProperty('comment') : '';
  const elapsedMinutes = (product.productTimestamp - detail.time.getTime()) / 60_000;
  return {
    Product: product.type,
    'Authoritative Event ID': detail.id,
    Code: code,
    Associated: associatedIds.includes(code),
    'Product Source': product.source,
    'Product Version': product.getNumber('version') ?? product.version,
    'Update Time': product.updateTime,
    'Elapsed (min)': Math.round(elapsedMinutes * 10) / 10,
    URL: representativeURL(product),
    Comment: comment === null ? '' : String(comment),
    Description: describeProduct(product),
  };
}

/**
 * History rows for every version from every source of the given types
 */
export function historyRows(
  detail: DetailEvent,
  productTypes: readonly string[] = PRODUCT_TYPES
): Row[] {
  const idsProperty = detail.hasProperty('ids') ? detail.getProperty('ids') : null;
  const associatedIds =
    typeof idsProperty === 'string' ? idsProperty.split(',').filter((id) => id.length > 0) : [detail.id];

  const entries: { row: Row; time: number }[] = [];
  for (const productType of productTypes) {
    if (!detail.hasProduct(productType)) continue;
    for (const product of detail.getProducts(productType, { source: 'all', version: 'all' })) {
      entries.push({ row: historyRow(detail, product, associatedIds), time: product.productTimestamp });
    }
  }
  return entries.sort((a, b) => a.time - b.time).map((entry) => entry.row);
}

/**
 * Rows of one product type with Description pairs spread into columns
 */
export function splitHistory(rows: readonly Row[], productType: string): Row[] {
  return rows
    .filter((row) => row['Product'] === productType)
    .map((row) => {
      const { Description: description, ...rest } = row;
      const expanded: Row = { ...rest };
      if (typeof description === 'string' && description.length > 0) {
        for (const pair of description.split(DESCRIPTION_SEPARATOR)) {
          const cut = pair.indexOf(DESCRIPTION_PAIR_SEPARATOR);
          if (cut < 0) continue;
          expanded[pair.slice(0, cut)] = pair.slice(cut + 1);
        }
      }
      return expanded;
    });
}
