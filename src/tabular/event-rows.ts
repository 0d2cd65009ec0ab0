/**
 * Event rows
 *
 * Flattens summary and detail events into rows. Detail rows may carry
 * moment-tensor and focal-mechanism columns named `{src}_{field}`, where
 * `src` is the product's eventsource plus its derived magnitude type or
 * beachball type, so columns vary from event to event; buildTable unions
 * them.
 */

import { ProductNotFoundError } from '../core/errors.js';
import { parseTime } from '../core/utils/time.js';
import { createLogger } from '../core/utils/logger.js';
import type { DetailEvent } from '../models/detail-event.js';
import type { ResolvedProduct } from '../models/product.js';
import type { SummaryEvent } from '../models/summary-event.js';
import type { CellValue, Row, Table } from './types.js';

const logger = createLogger({ module: 'tabular' });

export type ProductSelection = 'none' | 'preferred' | 'all';

export interface DetailRowOptions {
  /** Take identity fields from this source's phase-data or origin product */
  readonly catalog?: string;
  readonly tensors?: ProductSelection;
  readonly focals?: ProductSelection;
  /** Derived hypocenter, percent double couple and source duration */
  readonly momentSupplement?: boolean;
}

export const DETAIL_COLUMNS = [
  'id',
  'time',
  'location',
  'latitude',
  'longitude',
  'depth',
  'magnitude',
  'magtype',
  'url',
  'eventtype',
  'alert',
  'significance',
] as const;

// ============================================================================
// Summary
// ============================================================================

export function summaryRow(event: SummaryEvent): Row {
  return event.toRecord();
}

// ============================================================================
// Detail
// ============================================================================

function text(product: ResolvedProduct, key: string): string | undefined {
  if (!product.hasProperty(key)) return undefined;
  const value = product.getProperty(key);
  return value === null ? undefined : String(value);
}

function numberOrMissing(product: ResolvedProduct, key: string): number | undefined {
  return product.getNumber(key) ?? undefined;
}

/**
 * Column prefix for a tensor or focal mechanism
 */
export function mechanismSource(product: ResolvedProduct): string {
  const eventSource = text(product, 'eventsource') ?? product.source;
  const magnitudeType = text(product, 'derived-magnitude-type');
  if (magnitudeType !== undefined) {
    return `${eventSource}_${magnitudeType}`;
  }
  const beachball = text(product, 'beachball-type');
  if (beachball !== undefined) {
    const parts = beachball.split('/');
    return `${eventSource}_${parts[parts.length - 1] ?? beachball}`;
  }
  return eventSource;
}

function nodalPlaneColumns(product: ResolvedProduct, prefix: string): Row {
  const row: Row = {};
  for (const plane of [1, 2]) {
    row[`${prefix}_np${plane}_strike`] = numberOrMissing(product, `nodal-plane-${plane}-strike`);
    row[`${prefix}_np${plane}_dip`] = numberOrMissing(product, `nodal-plane-${plane}-dip`);
    // older submissions call rake "slip"
    row[`${prefix}_np${plane}_rake`] =
      numberOrMissing(product, `nodal-plane-${plane}-rake`) ??
      numberOrMissing(product, `nodal-plane-${plane}-slip`);
  }
  return row;
}

export function momentTensorColumns(tensor: ResolvedProduct, supplement = false): Row {
  const prefix = mechanismSource(tensor);
  const row: Row = {};
  for (const component of ['mrr', 'mtt', 'mpp', 'mrt', 'mrp', 'mtp']) {
    row[`${prefix}_${component}`] = numberOrMissing(tensor, `tensor-${component}`);
  }
  if (tensor.hasProperty('nodal-plane-1-strike')) {
    Object.assign(row, nodalPlaneColumns(tensor, prefix));
  }

  if (supplement) {
    if (tensor.hasProperty('derived-latitude')) {
      row[`${prefix}_derived_latitude`] = numberOrMissing(tensor, 'derived-latitude');
      row[`${prefix}_derived_longitude`] = numberOrMissing(tensor, 'derived-longitude');
      row[`${prefix}_derived_depth`] = numberOrMissing(tensor, 'derived-depth');
    }
    if (tensor.hasProperty('percent-double-couple')) {
      row[`${prefix}_percent_double_couple`] = numberOrMissing(tensor, 'percent-double-couple');
    }
    if (tensor.hasProperty('sourcetime-duration')) {
      row[`${prefix}_sourcetime_duration`] = numberOrMissing(tensor, 'sourcetime-duration');
    }
  }
  return row;
}

export function focalMechanismColumns(focal: ResolvedProduct): Row {
  const prefix = text(focal, 'eventsource') ?? focal.source;
  if (focal.getNumber('nodal-plane-1-strike') === null) {
    logger.warn('No focal angles in focal-mechanism product', {
      source: prefix,
      code: focal.code,
    });
    return {};
  }
  return nodalPlaneColumns(focal, prefix);
}

function catalogIdentity(detail: DetailEvent, catalog: string): Row {
  const fromType = ['phase-data', 'origin'].find(
    (type) =>
      detail.hasProduct(type) &&
      detail.getProducts(type, { source: 'all' }).some((product) => product.source === catalog)
  );
  if (fromType === undefined) {
    throw new ProductNotFoundError(
      `DetailEvent ${detail.id} has no phase-data or origin products for source ${catalog}`,
      'origin',
      catalog
    );
  }

  const [origin] = detail.getProducts(fromType, { source: catalog });
  if (!origin) {
    throw new ProductNotFoundError(`No ${fromType} product for source ${catalog}`, fromType, catalog);
  }
  const eventTime = text(origin, 'eventtime');
  return {
    id: `${text(origin, 'eventsource') ?? ''}${text(origin, 'eventsourcecode') ?? ''}`,
    time: eventTime === undefined ? undefined : parseISOTime(eventTime),
    location: detail.location,
    latitude: numberOrMissing(origin, 'latitude'),
    longitude: numberOrMissing(origin, 'longitude'),
    depth: numberOrMissing(origin, 'depth'),
    magnitude: numberOrMissing(origin, 'magnitude'),
    magtype: text(origin, 'magnitude-type'),
    alert: detail.alert,
  };
}

// product eventtime values carry a zone suffix and sometimes fewer fraction digits
function parseISOTime(value: string): Date | undefined {
  const parsed = new Date(value);
  if (!Number.isNaN(parsed.getTime())) return parsed;
  return parseTime(value);
}

function selectMechanisms(detail: DetailEvent, productType: string, selection: ProductSelection): ResolvedProduct[] {
  if (selection === 'none' || !detail.hasProduct(productType)) return [];
  if (selection === 'all') {
    return detail.getProducts(productType, { source: 'all', version: 'all' });
  }
  return detail.getProducts(productType).slice(0, 1);
}

/**
 * One row for a detail event
 *
 * @throws {ProductNotFoundError} When `catalog` names a source with no
 *   phase-data or origin product
 */
export function detailRow(detail: DetailEvent, options: DetailRowOptions = {}): Row {
  const row: Row =
    options.catalog === undefined
      ? {
          id: detail.id,
          time: detail.time,
          location: detail.location,
          latitude: detail.latitude,
          longitude: detail.longitude,
          depth: detail.depth,
          magnitude: detail.magnitude,
          magtype: detail.magType,
          url: detail.url,
          eventtype: detail.eventType,
          alert: detail.alert,
          significance: detail.significance,
        }
      : catalogIdentity(detail, options.catalog);

  for (const tensor of selectMechanisms(detail, 'moment-tensor', options.tensors ?? 'none')) {
    Object.assign(row, momentTensorColumns(tensor, options.momentSupplement ?? false));
  }
  for (const focal of selectMechanisms(detail, 'focal-mechanism', options.focals ?? 'none')) {
    Object.assign(row, focalMechanismColumns(focal));
  }
  return row;
}

// ============================================================================
// Tables
// ============================================================================

/**
 * Union the columns of many rows: leading columns first (those that occur),
 * then every other column in first-seen order. Missing cells are undefined.
 */
export function buildTable(rows: readonly Row[], leadingColumns: readonly string[] = []): Table {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }

  const columns = leadingColumns.filter((column) => seen.has(column));
  const leading = new Set(columns);
  for (const key of seen) {
    if (!leading.has(key)) {
      columns.push(key);
    }
  }

  const normalized = rows.map((row) => {
    const full: Row = {};
    for (const column of columns) {
      const value: CellValue = row[column];
      full[column] = value;
    }
    return full;
  });
  return { columns, rows: normalized };
}
