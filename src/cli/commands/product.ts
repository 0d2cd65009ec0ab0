/**
 * Product Command
 *
 * Download content files (or list their URLs) from one product type, for a
 * single event or for every event a search returns.
 *
 * Usage:
 *   quakecat product <type> [contents...] [options]
 *
 * Examples:
 *   quakecat product shakemap grid.xml -i us7000abcd
 *   quakecat product dyfi cdi_zip.xml -s 2024-01-01 -m 6,9 --get-version all
 *   quakecat product losspager --list-url -i us7000abcd
 *
 * Files land in <output-dir>/<eventid>/<eventid>_<source>_<version>_<file>.
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { ArgumentConflictError, CancelledError } from '../../core/errors.js';
import type { DetailEvent } from '../../models/detail-event.js';
import type { ResolvedProduct } from '../../models/product.js';
import { fetchDetails } from '../../tabular/detail-batch.js';
import { getGlobalContext, type CommandContext } from '../lib/context.js';
import { findEvents } from '../lib/events.js';
import { addFilterOptions, type FilterOptions, filtersFromOptions } from '../lib/options.js';

export interface ProductCommandOptions extends FilterOptions {
  readonly eventId?: string;
  readonly getSource: string;
  readonly getVersion: string;
  readonly outputDir: string;
  readonly listUrl?: boolean;
}

export interface ProductCommandResult {
  /** Files written */
  readonly files: string[];
  /** Content URLs (list mode) */
  readonly urls: string[];
  /** Event ids that had no product of the requested type */
  readonly skipped: string[];
}

/**
 * Register the product command
 */
export function registerProductCommand(parent: Command): void {
  const command = parent
    .command('product')
    .description('Download product content files for one event or a search')
    .argument('<type>', 'Product type (e.g. shakemap, dyfi, losspager)')
    .argument('[contents...]', 'Content name patterns, matched at the end of each content key');
  addFilterOptions(command)
    .option('-i, --event-id <id>', 'A single event instead of a search')
    .option('--get-source <source>', 'Product source: preferred|all|<network code>', 'preferred')
    .option('--get-version <version>', 'Product version: preferred|first|last|all', 'preferred')
    .option('-d, --output-dir <dir>', 'Directory to write into', process.cwd())
    .option('-l, --list-url', 'Print content URLs instead of downloading')
    .action(async (productType: string, contents: string[], options: ProductCommandOptions) => {
      const context = getGlobalContext();
      const result = await executeProduct(productType, contents, options, context);
      for (const url of result.urls) {
        process.stdout.write(`${url}\n`);
      }
      context.logger.commandEnd(true, { files: result.files.length, skipped: result.skipped.length });
    });
}

function versionLabel(product: ResolvedProduct, width: number): string {
  return String(product.version).padStart(width, '0');
}

/**
 * Execute the product command
 *
 * @throws {ArgumentConflictError} Without content patterns outside list mode
 * @throws {ProductNotFoundError} When a single requested event lacks the product
 */
export async function executeProduct(
  productType: string,
  contents: readonly string[],
  options: ProductCommandOptions,
  context: CommandContext
): Promise<ProductCommandResult> {
  const { logger } = context;
  logger.commandStart('product', { productType, contents: contents.join(',') });

  if (contents.length === 0 && !options.listUrl) {
    throw new ArgumentConflictError('At least one content pattern is required unless --list-url is given');
  }

  const details: DetailEvent[] = [];
  const skipped: string[] = [];
  if (options.eventId !== undefined) {
    details.push(
      await context.client.getEventById(options.eventId, { signal: context.signal, includeSuperseded: true })
    );
  } else {
    const filters = filtersFromOptions({ ...options, productType: options.productType ?? productType });
    const events = await findEvents(filters, context, { scenario: options.scenario, bufferKm: options.buffer });
    logger.info('Found events', { count: events.length });
    const { results, failures } = await fetchDetails(
      context.client,
      events,
      {
        concurrency: context.config.defaults.concurrency,
        signal: context.signal,
        includeSuperseded: true,
        logger,
        onProgress: (current, total) => logger.progress({ current, total, label: 'details' }),
      },
      (detail) => detail
    );
    if (failures.length > 0) {
      logger.warn('Some detail requests failed', { failed: failures.length, of: events.length });
    }
    for (const detail of results) {
      if (detail.hasProduct(productType)) {
        details.push(detail);
      } else {
        skipped.push(detail.id);
      }
    }
  }

  const files: string[] = [];
  const urls: string[] = [];
  for (const detail of details) {
    // a single explicit event without the product raises here
    const products = detail.getProducts(productType, { source: options.getSource, version: options.getVersion });
    const width = String(Math.max(...products.map((product) => product.version))).length;

    for (const product of products) {
      if (options.listUrl) {
        urls.push(...listURLs(product, contents));
        continue;
      }
      for (const pattern of contents) {
        const match = product.findShortestContent(pattern);
        if (match === null) {
          logger.warn('No content matches pattern', { eventId: detail.id, pattern, source: product.source });
          continue;
        }
        const fileName = `${detail.id}_${product.source}_${versionLabel(product, width)}_${match.fileName}`;
        const filePath = join(options.outputDir, detail.id, fileName);
        try {
          await context.fetcher.downloadContent(product, pattern, filePath, { signal: context.signal });
          files.push(filePath);
        } catch (error) {
          if (error instanceof CancelledError) throw error;
          logger.warn('Could not download content; continuing', {
            eventId: detail.id,
            file: match.fileName,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  return { files, urls, skipped };
}

function listURLs(product: ResolvedProduct, patterns: readonly string[]): string[] {
  if (patterns.length === 0) {
    return Object.values(product.contents).flatMap((entry) => (entry.url ? [entry.url] : []));
  }
  return patterns.flatMap((pattern) => {
    const url = product.getContentURL(pattern);
    return url === null ? [] : [url];
  });
}
