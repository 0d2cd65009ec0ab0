/**
 * Findid Command
 *
 * Find the catalog event closest in time and space to an observation.
 *
 * Usage:
 *   quakecat findid <time> <lat> <lon> [options]
 *
 * Prints the best match's id (or URL with --url); --all prints every
 * candidate ranked by normalized distance.
 */

import type { Command } from 'commander';
import { DEFAULT_MATCH_RADIUS_KM, DEFAULT_MATCH_WINDOW_SECONDS, findNearestEvents, type EventMatch } from '../../search/nearest.js';
import type { Table } from '../../tabular/types.js';
import { buildTable } from '../../tabular/event-rows.js';
import { getGlobalContext, type CommandContext } from '../lib/context.js';
import { parseChoice, parseNumber, parseTimeOption } from '../lib/options.js';
import { formatOutput, OUTPUT_FORMATS, writeOutput, type OutputFormat } from '../lib/output.js';

export const MATCH_COLUMNS = [
  'id',
  'time',
  'location',
  'latitude',
  'longitude',
  'depth',
  'magnitude',
  'distance_km',
  'azimuth',
  'time_delta_s',
  'normalized_distance',
] as const;

export interface FindIdCommandOptions {
  readonly radius: number;
  readonly window: number;
  readonly all?: boolean;
  readonly url?: boolean;
  readonly format: OutputFormat;
}

/**
 * Register the findid command
 */
export function registerFindIdCommand(parent: Command): void {
  parent
    .command('findid')
    .description('Find the id of the event closest to a time and location')
    .argument('<time>', 'Origin time (YYYY-mm-ddTHH:MM:SS)', parseTimeOption)
    .argument('<lat>', 'Latitude', parseNumber)
    .argument('<lon>', 'Longitude', parseNumber)
    .option('-r, --radius <km>', 'Search radius in km', parseNumber, DEFAULT_MATCH_RADIUS_KM)
    .option('-w, --window <seconds>', 'Time window in seconds either side', parseNumber, DEFAULT_MATCH_WINDOW_SECONDS)
    .option('-a, --all', 'Print every candidate, ranked')
    .option('-u, --url', 'Print the event URL instead of the id')
    .option('-f, --format <fmt>', `Format for --all: ${OUTPUT_FORMATS.join('|')}`, parseChoice(OUTPUT_FORMATS), 'table')
    .action(async (time: Date, latitude: number, longitude: number, options: FindIdCommandOptions) => {
      const context = getGlobalContext();
      const matches = await executeFindId({ time, latitude, longitude }, options, context);
      const best = matches[0];

      if (best === undefined) {
        context.logger.warn('No matching events found', { time: time.toISOString(), latitude, longitude });
      } else if (options.all) {
        await writeOutput(formatOutput(matchTable(matches), options.format));
      } else {
        await writeOutput(options.url ? best.event.url : best.event.id);
      }
      context.logger.commandEnd(true, { matches: matches.length });
    });
}

/**
 * Ranked matches as a table
 */
export function matchTable(matches: readonly EventMatch[]): Table {
  const rows = matches.map((match) => ({
    id: match.event.id,
    time: match.event.time,
    location: match.event.location,
    latitude: match.event.latitude,
    longitude: match.event.longitude,
    depth: match.event.depth,
    magnitude: match.event.magnitude,
    distance_km: Math.round(match.distanceKm * 1000) / 1000,
    azimuth: Math.round(match.azimuth * 10) / 10,
    time_delta_s: match.timeDeltaSeconds,
    normalized_distance: Math.round(match.normalizedDistance * 1000) / 1000,
  }));
  return buildTable(rows, MATCH_COLUMNS);
}

/**
 * Execute the findid command
 */
export async function executeFindId(
  observation: { readonly time: Date; readonly latitude: number; readonly longitude: number },
  options: Pick<FindIdCommandOptions, 'radius' | 'window'>,
  context: CommandContext
): Promise<EventMatch[]> {
  context.logger.commandStart('findid', {
    time: observation.time.toISOString(),
    latitude: observation.latitude,
    longitude: observation.longitude,
  });
  return findNearestEvents(
    context.client,
    { ...observation, radiusKm: options.radius, windowSeconds: options.window },
    { signal: context.signal }
  );
}
