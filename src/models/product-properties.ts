/**
 * Per-Product-Type Property Schemas
 *
 * ComCat transmits every product property as a string. For the product types
 * the library knows, these schemas name the common fields and convert numeric
 * ones; unknown keys pass through. Unrecognized product types fall back to the
 * generic string-keyed map on ResolvedProduct.
 *
 * @module product-properties
 */

import { z } from 'zod';
import { ParsingError } from '../core/errors.js';
import type { PropertyValue } from './schemas.js';

// ============================================================================
// Field Types
// ============================================================================

/**
 * Number transmitted as a string ("5.2") or as a JSON number
 */
const numeric = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if ((typeof value === 'string' && value.trim() === '') || !Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, got "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const text = z.string();

const nodalPlanes = {
  'nodal-plane-1-strike': numeric.optional(),
  'nodal-plane-1-dip': numeric.optional(),
  'nodal-plane-1-rake': numeric.optional(),
  'nodal-plane-2-strike': numeric.optional(),
  'nodal-plane-2-dip': numeric.optional(),
  'nodal-plane-2-rake': numeric.optional(),
};

const hypocenter = {
  eventsource: text.optional(),
  eventsourcecode: text.optional(),
  eventtime: text.optional(),
  latitude: numeric.optional(),
  longitude: numeric.optional(),
  depth: numeric.optional(),
  magnitude: numeric.optional(),
  'magnitude-type': text.optional(),
};

// ============================================================================
// Schemas
// ============================================================================

export const OriginPropertiesSchema = z
  .object({
    ...hypocenter,
    'review-status': text.optional(),
    'evaluation-status': text.optional(),
    'num-stations-used': numeric.optional(),
    'num-phases-used': numeric.optional(),
    'azimuthal-gap': numeric.optional(),
    'minimum-distance': numeric.optional(),
    'standard-error': numeric.optional(),
    'horizontal-error': numeric.optional(),
    'vertical-error': numeric.optional(),
    'magnitude-error': numeric.optional(),
    'magnitude-num-stations-used': numeric.optional(),
  })
  .passthrough();

// phase-data carries the same hypocenter fields as origin
export const PhaseDataPropertiesSchema = OriginPropertiesSchema;

export const MomentTensorPropertiesSchema = z
  .object({
    eventsource: text.optional(),
    'beachball-type': text.optional(),
    'derived-magnitude': numeric.optional(),
    'derived-magnitude-type': text.optional(),
    'derived-latitude': numeric.optional(),
    'derived-longitude': numeric.optional(),
    'derived-depth': numeric.optional(),
    'derived-eventtime': text.optional(),
    'scalar-moment': numeric.optional(),
    'percent-double-couple': numeric.optional(),
    'sourcetime-duration': numeric.optional(),
    'tensor-mrr': numeric.optional(),
    'tensor-mtt': numeric.optional(),
    'tensor-mpp': numeric.optional(),
    'tensor-mrt': numeric.optional(),
    'tensor-mrp': numeric.optional(),
    'tensor-mtp': numeric.optional(),
    ...nodalPlanes,
  })
  .passthrough();

export const FocalMechanismPropertiesSchema = z
  .object({
    eventsource: text.optional(),
    'beachball-type': text.optional(),
    'evaluation-status': text.optional(),
    ...nodalPlanes,
  })
  .passthrough();

export const ShakemapPropertiesSchema = z
  .object({
    ...hypocenter,
    maxmmi: numeric.optional(),
    maxpga: numeric.optional(),
    maxpgv: numeric.optional(),
    maxpsa03: numeric.optional(),
    maxpsa10: numeric.optional(),
    maxpsa30: numeric.optional(),
    'map-status': text.optional(),
    'event-type': text.optional(),
    'review-status': text.optional(),
    version: numeric.optional(),
  })
  .passthrough();

export const LossPagerPropertiesSchema = z
  .object({
    ...hypocenter,
    alertlevel: z.enum(['green', 'yellow', 'orange', 'red', 'pending']).optional(),
    maxmmi: numeric.optional(),
  })
  .passthrough();

export const DyfiPropertiesSchema = z
  .object({
    ...hypocenter,
    maxmmi: numeric.optional(),
    'num-responses': numeric.optional(),
    'max-distance': numeric.optional(),
    'min-distance': numeric.optional(),
  })
  .passthrough();

export const FiniteFaultPropertiesSchema = z
  .object({
    ...hypocenter,
    'derived-magnitude': numeric.optional(),
    'derived-magnitude-type': text.optional(),
    'maximum-slip': numeric.optional(),
    'scalar-moment': numeric.optional(),
  })
  .passthrough();

export const OafPropertiesSchema = z
  .object({
    eventsource: text.optional(),
    eventsourcecode: text.optional(),
    'review-status': text.optional(),
    'forecast-type': text.optional(),
  })
  .passthrough();

export const GroundFailurePropertiesSchema = z
  .object({
    ...hypocenter,
    'landslide-alert': text.optional(),
    'liquefaction-alert': text.optional(),
    'landslide-hazard-alert-value': numeric.optional(),
    'liquefaction-hazard-alert-value': numeric.optional(),
    'landslide-population-alert-value': numeric.optional(),
    'liquefaction-population-alert-value': numeric.optional(),
  })
  .passthrough();

export const PRODUCT_PROPERTY_SCHEMAS = {
  origin: OriginPropertiesSchema,
  'phase-data': PhaseDataPropertiesSchema,
  'moment-tensor': MomentTensorPropertiesSchema,
  'focal-mechanism': FocalMechanismPropertiesSchema,
  shakemap: ShakemapPropertiesSchema,
  losspager: LossPagerPropertiesSchema,
  dyfi: DyfiPropertiesSchema,
  'finite-fault': FiniteFaultPropertiesSchema,
  oaf: OafPropertiesSchema,
  'ground-failure': GroundFailurePropertiesSchema,
} as const;

export type KnownProductType = keyof typeof PRODUCT_PROPERTY_SCHEMAS;

export type ProductPropertiesOf<K extends KnownProductType> = z.output<
  (typeof PRODUCT_PROPERTY_SCHEMAS)[K]
>;

export type OriginProperties = ProductPropertiesOf<'origin'>;
export type MomentTensorProperties = ProductPropertiesOf<'moment-tensor'>;
export type FocalMechanismProperties = ProductPropertiesOf<'focal-mechanism'>;
export type ShakemapProperties = ProductPropertiesOf<'shakemap'>;
export type LossPagerProperties = ProductPropertiesOf<'losspager'>;

/**
 * Known fields only, converted; absent fields are omitted
 */
export type TypedPropertySubset = Readonly<Record<string, string | number>>;

// ============================================================================
// Parsing
// ============================================================================

export function isKnownProductType(type: string): type is KnownProductType {
  return Object.prototype.hasOwnProperty.call(PRODUCT_PROPERTY_SCHEMAS, type);
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  properties: Readonly<Record<string, PropertyValue>>,
  productType: string
): z.output<S> {
  const result = schema.safeParse(properties);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ParsingError(`Invalid ${productType} product properties: ${issues[0] ?? 'invalid'}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Parse a property map with the schema for its product type
 *
 * @throws {ParsingError} When a known numeric field does not hold a number
 */
export function parseProductProperties<K extends KnownProductType>(
  productType: K,
  properties: Readonly<Record<string, PropertyValue>>
): ProductPropertiesOf<K> {
  return parseWith(PRODUCT_PROPERTY_SCHEMAS[productType], properties, productType);
}

/**
 * The schema-named fields of a property map, converted to their types.
 * Unknown product types yield every string or number property unchanged.
 */
export function typedPropertySubset(
  productType: string,
  properties: Readonly<Record<string, PropertyValue>>
): TypedPropertySubset {
  if (!isKnownProductType(productType)) {
    const subset: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(properties)) {
      if (typeof value === 'string' || typeof value === 'number') {
        subset[key] = value;
      }
    }
    return subset;
  }

  const schema = PRODUCT_PROPERTY_SCHEMAS[productType];
  const parsed: Record<string, unknown> = parseWith(schema, properties, productType);
  const subset: Record<string, string | number> = {};
  for (const key of Object.keys(schema.shape)) {
    const value = parsed[key];
    if (typeof value === 'string' || typeof value === 'number') {
      subset[key] = value;
    }
  }
  return subset;
}
