/**
 * Event lookup shared by the search, count and product commands
 *
 * @module cli/lib/events
 */

import { ArgumentConflictError } from '../../core/errors.js';
import type { SummaryEvent } from '../../models/summary-event.js';
import { filterByCountry, findCountry, getCountryBounds } from '../../search/country-bounds.js';
import type { SearchFilters } from '../../search/query-params.js';
import type { CommandContext } from './context.js';

export interface FindEventsOptions {
  readonly scenario?: boolean;
  /** Overrides defaults.bufferKm */
  readonly bufferKm?: number;
}

/**
 * Run a search, expanding a country filter into padded boxes and trimming
 * the union to the buffered outline
 *
 * @throws {ArgumentConflictError} For an unknown country code
 */
export async function findEvents(
  filters: SearchFilters,
  context: CommandContext,
  options: FindEventsOptions = {}
): Promise<SummaryEvent[]> {
  const searchOptions = { signal: context.signal, scenario: options.scenario };
  if (filters.country === undefined) {
    return context.client.search(filters, searchOptions);
  }

  const features = await context.loadCountries();
  const country = findCountry(features, filters.country);
  if (country === null) {
    throw new ArgumentConflictError(`Unknown country code "${filters.country}"`);
  }

  const bufferKm = options.bufferKm ?? context.config.defaults.bufferKm;
  const boxes = getCountryBounds(country, bufferKm);
  context.logger.debug('Searching country', { country: filters.country, boxes: boxes.length, bufferKm });

  const candidates = await context.client.searchCountry(filters, boxes, searchOptions);
  const events = filterByCountry(candidates, country, bufferKm);
  context.logger.debug('Trimmed to country outline', { candidates: candidates.length, kept: events.length });
  return events;
}
