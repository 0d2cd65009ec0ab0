/**
 * quakecat
 *
 * Client library for the USGS ComCat earthquake catalog: segmented searches
 * under the server's event ceiling, typed summary and detail events, product
 * version resolution and tabular flattening.
 *
 * @example
 * ```typescript
 * import { CatalogClient } from 'quakecat';
 *
 * const client = new CatalogClient();
 * const events = await client.search({
 *   startTime: new Date('2024-01-01T00:00:00Z'),
 *   endTime: new Date('2024-01-31T00:00:00Z'),
 *   minMagnitude: 5,
 * });
 * const detail = await client.getDetailEvent(events[0]);
 * const [shakemap] = detail.getProducts('shakemap');
 * ```
 *
 * @packageDocumentation
 */

// Core
export * from './core/errors.js';
export * from './core/constants.js';
export * from './core/http-client.js';
export * from './core/utils/logger.js';
export * from './core/utils/time.js';

// Models
export * from './models/schemas.js';
export * from './models/product-properties.js';
export * from './models/product.js';
export * from './models/event-base.js';
export * from './models/summary-event.js';
export * from './models/detail-event.js';

// Resolver
export * from './resolver/version-resolver.js';

// Search
export * from './search/query-params.js';
export * from './search/time-segments.js';
export * from './search/country-bounds.js';
export * from './search/catalog-client.js';
export * from './search/nearest.js';

// Content
export * from './content/content-fetcher.js';

// Tabular
export * from './tabular/types.js';
export * from './tabular/event-rows.js';
export * from './tabular/history.js';
export * from './tabular/detail-batch.js';
