/**
 * History Command
 *
 * Every version of every product for one event, in update-time order.
 *
 * Usage:
 *   quakecat history <eventid> [options]
 *
 * Options:
 *   -p, --product-types <list>      Only these product types (comma-separated)
 *   -x, --exclude-products <list>   Drop these product types
 *   --split                         One table per product type, Description expanded
 *   -d, --output-dir <dir>          Directory for split tables
 *   -f, --format <fmt>              csv|tab|json|ndjson|table (default: csv)
 *   -o, --output <file>             Output file (default: stdout)
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { PRODUCT_TYPES } from '../../core/constants.js';
import { ArgumentConflictError } from '../../core/errors.js';
import { buildTable } from '../../tabular/event-rows.js';
import { HISTORY_COLUMNS, historyRows, splitHistory } from '../../tabular/history.js';
import type { Table } from '../../tabular/types.js';
import { getGlobalContext, type CommandContext } from '../lib/context.js';
import { parseChoice, parseList } from '../lib/options.js';
import { formatOutput, OUTPUT_FORMATS, writeOutput, type OutputFormat } from '../lib/output.js';

export interface HistoryCommandOptions {
  readonly productTypes?: string[];
  readonly excludeProducts?: string[];
  readonly split?: boolean;
  readonly outputDir?: string;
  readonly format: OutputFormat;
  readonly output?: string;
}

export interface HistoryTables {
  readonly eventId: string;
  /** Product type → table when split, otherwise a single `all` entry */
  readonly tables: Map<string, Table>;
}

const EXTENSIONS: Record<OutputFormat, string> = {
  csv: 'csv',
  tab: 'txt',
  json: 'json',
  ndjson: 'ndjson',
  table: 'txt',
};

/**
 * Register the history command
 */
export function registerHistoryCommand(parent: Command): void {
  parent
    .command('history')
    .description('Show the product history of an event')
    .argument('<eventid>', 'ComCat event id')
    .option('-p, --product-types <list>', 'Product types to include (comma-separated)', parseList)
    .option('-x, --exclude-products <list>', 'Product types to leave out (comma-separated)', parseList)
    .option('--split', 'Write one table per product type with descriptions expanded')
    .option('-d, --output-dir <dir>', 'Directory for split tables')
    .option('-f, --format <fmt>', `Output format: ${OUTPUT_FORMATS.join('|')}`, parseChoice(OUTPUT_FORMATS), 'csv')
    .option('-o, --output <file>', 'Output file path')
    .action(async (eventId: string, options: HistoryCommandOptions) => {
      const context = getGlobalContext();
      const result = await executeHistory(eventId, options, context);

      if (!options.split) {
        const table = result.tables.get('all');
        if (table) {
          await writeOutput(formatOutput(table, options.format), options.output);
        }
      } else {
        const outputDir = options.outputDir ?? process.cwd();
        for (const [productType, table] of result.tables) {
          const filePath = join(outputDir, `${result.eventId}_${productType}.${EXTENSIONS[options.format]}`);
          await writeOutput(formatOutput(table, options.format), filePath);
          context.logger.info('Wrote history table', { productType, file: filePath });
        }
      }
      context.logger.commandEnd(true, { tables: result.tables.size });
    });
}

/**
 * Resolve the product types to report on
 */
export function selectProductTypes(include?: readonly string[], exclude?: readonly string[]): string[] {
  const selected = include && include.length > 0 ? [...include] : [...PRODUCT_TYPES];
  const dropped = new Set(exclude ?? []);
  return selected.filter((productType) => !dropped.has(productType));
}

/**
 * Execute the history command
 */
export async function executeHistory(
  eventId: string,
  options: HistoryCommandOptions,
  context: CommandContext
): Promise<HistoryTables> {
  context.logger.commandStart('history', { eventId });
  if (options.split && options.output) {
    throw new ArgumentConflictError('--split writes one file per product type; use --output-dir instead of --output');
  }

  const productTypes = selectProductTypes(options.productTypes, options.excludeProducts);
  const detail = await context.client.getEventById(eventId, { signal: context.signal, includeSuperseded: true });
  const rows = historyRows(detail, productTypes);
  context.logger.info('Collected product versions', { eventId: detail.id, rows: rows.length });

  const tables = new Map<string, Table>();
  if (!options.split) {
    tables.set('all', buildTable(rows, HISTORY_COLUMNS));
    return { eventId: detail.id, tables };
  }

  for (const productType of productTypes) {
    const typeRows = splitHistory(rows, productType);
    if (typeRows.length === 0) continue;
    tables.set(
      productType,
      buildTable(
        typeRows,
        HISTORY_COLUMNS.filter((column) => column !== 'Description')
      )
    );
  }
  return { eventId: detail.id, tables };
}
