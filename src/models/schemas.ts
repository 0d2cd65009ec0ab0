/**
 * ComCat Document Schemas
 *
 * zod schemas for every JSON document the client reads: search results
 * (FeatureCollection), detail documents (Feature with products), count
 * responses and raw product submissions.
 *
 * Unknown keys pass through untouched so new server fields survive a round
 * trip; only the fields the library reads are checked.
 */

import { z } from 'zod';
import { ParsingError } from '../core/errors.js';

// ============================================================================
// Scalars
// ============================================================================

export const PropertyValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type PropertyValue = z.infer<typeof PropertyValueSchema>;

/**
 * Point geometry: [longitude, latitude, depth?]
 */
export const PointGeometrySchema = z
  .object({
    type: z.literal('Point'),
    coordinates: z.tuple([z.number(), z.number()]).rest(z.number().nullable()),
  })
  .passthrough();

// ============================================================================
// Products
// ============================================================================

export const ContentEntrySchema = z
  .object({
    contentType: z.string().optional(),
    lastModified: z.number().optional(),
    length: z.number().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export type ContentEntry = z.infer<typeof ContentEntrySchema>;

export const RawProductSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    code: z.string(),
    source: z.string(),
    updateTime: z.number(),
    status: z.string().default('UPDATE'),
    preferredWeight: z.number().int().default(0),
    properties: z.record(PropertyValueSchema).default({}),
    contents: z.record(ContentEntrySchema).default({}),
  })
  .passthrough();

export type RawProduct = z.infer<typeof RawProductSchema>;

// ============================================================================
// Events
// ============================================================================

const EventPropertiesShape = {
  mag: z.number().nullable().optional(),
  place: z.string().nullable().optional(),
  time: z.number(),
  updated: z.number().optional(),
  url: z.string().optional(),
  detail: z.string().optional(),
  alert: z.string().nullable().optional(),
  status: z.string().optional(),
  sig: z.number().nullable().optional(),
  net: z.string().optional(),
  code: z.string().optional(),
  ids: z.string().optional(),
  sources: z.string().optional(),
  types: z.string().optional(),
  magType: z.string().nullable().optional(),
  type: z.string().optional(),
};

export const SummaryFeatureSchema = z
  .object({
    type: z.literal('Feature'),
    id: z.string(),
    properties: z.object(EventPropertiesShape).passthrough(),
    geometry: PointGeometrySchema,
  })
  .passthrough();

export type SummaryFeature = z.infer<typeof SummaryFeatureSchema>;

export const DetailFeatureSchema = z
  .object({
    type: z.literal('Feature'),
    id: z.string(),
    properties: z
      .object({
        ...EventPropertiesShape,
        products: z.record(z.array(RawProductSchema)).default({}),
      })
      .passthrough(),
    geometry: PointGeometrySchema,
  })
  .passthrough();

export type DetailFeature = z.infer<typeof DetailFeatureSchema>;

export const SearchResponseSchema = z
  .object({
    type: z.literal('FeatureCollection'),
    metadata: z.object({ count: z.number().optional() }).passthrough().optional(),
    features: z.array(SummaryFeatureSchema),
  })
  .passthrough();

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export const CountResponseSchema = z
  .object({
    count: z.number().int().nonnegative(),
    maxAllowed: z.number().int().optional(),
  })
  .passthrough();

export type CountResponse = z.infer<typeof CountResponseSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate a document against a schema
 *
 * @throws {ParsingError} Listing every issue as `path: message`
 */
export function parseDocument<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  context: { readonly what: string; readonly url?: string }
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ParsingError(`Unexpected ${context.what} document: ${issues[0] ?? 'invalid'}`, {
      url: context.url,
      issues,
    });
  }
  return result.data;
}
