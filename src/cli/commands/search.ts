/**
 * Search Command
 *
 * Search the catalog and write one row per event, optionally upgraded to
 * detail rows with moment-tensor and focal-mechanism columns.
 *
 * Usage:
 *   quakecat search [options]
 *
 * Options:
 *   -s/-e/--num-days      Time window (default: the last 30 days)
 *   -b, --bounds          lonmin,lonmax,latmin,latmax
 *   -r, --radius          lat,lon,km
 *   --country <code>      ISO alpha-3 country (needs a countries file)
 *   --detail              Fetch each event's detail document
 *   --tensors <which>     none|preferred|all (implies --detail)
 *   --focals <which>      none|preferred|all (implies --detail)
 *   --supplement          Extra moment-tensor columns
 *   -f, --format <fmt>    csv|tab|json|ndjson|table (default: csv)
 *   -o, --output <file>   Output file (default: stdout)
 */

import type { Command } from 'commander';
import { SUMMARY_COLUMNS } from '../../models/summary-event.js';
import { fetchDetailRows } from '../../tabular/detail-batch.js';
import { buildTable, DETAIL_COLUMNS, summaryRow, type ProductSelection } from '../../tabular/event-rows.js';
import type { Table } from '../../tabular/types.js';
import { getGlobalContext, type CommandContext } from '../lib/context.js';
import { findEvents } from '../lib/events.js';
import { addFilterOptions, parseChoice, type FilterOptions, filtersFromOptions } from '../lib/options.js';
import { formatOutput, OUTPUT_FORMATS, writeOutput, type OutputFormat } from '../lib/output.js';

const SELECTIONS: readonly ProductSelection[] = ['none', 'preferred', 'all'];

export interface SearchCommandOptions extends FilterOptions {
  readonly detail?: boolean;
  readonly tensors?: ProductSelection;
  readonly focals?: ProductSelection;
  readonly supplement?: boolean;
  readonly format: OutputFormat;
  readonly output?: string;
}

/**
 * Register the search command
 */
export function registerSearchCommand(parent: Command): void {
  const command = parent.command('search').description('Search for events and write them as a table');
  addFilterOptions(command)
    .option('--detail', 'Fetch detail documents (slower; one request per event)')
    .option('--tensors <which>', 'Moment tensors: none|preferred|all', parseChoice(SELECTIONS))
    .option('--focals <which>', 'Focal mechanisms: none|preferred|all', parseChoice(SELECTIONS))
    .option('--supplement', 'Add derived location, double couple and duration for moment tensors')
    .option('-f, --format <fmt>', `Output format: ${OUTPUT_FORMATS.join('|')}`, parseChoice(OUTPUT_FORMATS), 'csv')
    .option('-o, --output <file>', 'Output file path')
    .action(async (options: SearchCommandOptions) => {
      const context = getGlobalContext();
      const table = await executeSearch(options, context);
      await writeOutput(formatOutput(table, options.format), options.output);
      context.logger.commandEnd(true, { rows: table.rows.length });
    });
}

function wantsDetail(options: SearchCommandOptions): boolean {
  return Boolean(
    options.detail ||
      (options.tensors && options.tensors !== 'none') ||
      (options.focals && options.focals !== 'none') ||
      options.supplement
  );
}

/**
 * Execute the search command
 */
export async function executeSearch(options: SearchCommandOptions, context: CommandContext): Promise<Table> {
  const { logger } = context;
  logger.commandStart('search');

  const filters = filtersFromOptions(options);
  const events = await findEvents(filters, context, { scenario: options.scenario, bufferKm: options.buffer });
  logger.info('Found events', { count: events.length });

  if (!wantsDetail(options)) {
    return buildTable(events.map(summaryRow), SUMMARY_COLUMNS);
  }

  const { rows, failures } = await fetchDetailRows(context.client, events, {
    concurrency: context.config.defaults.concurrency,
    signal: context.signal,
    catalog: options.catalog,
    tensors: options.tensors,
    focals: options.focals,
    momentSupplement: options.supplement,
    logger,
    onProgress: (current, total) => logger.progress({ current, total, label: 'details' }),
  });
  if (failures.length > 0) {
    logger.warn('Some events were skipped', { skipped: failures.length });
  }
  return buildTable(rows, DETAIL_COLUMNS);
}
