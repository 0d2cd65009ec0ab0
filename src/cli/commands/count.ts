/**
 * Count Command
 *
 * Report how many events match a set of filters. Country filters need the
 * events themselves (the outline trim happens client-side), so they fall
 * back to a search.
 *
 * Usage:
 *   quakecat count [options]
 */

import type { Command } from 'commander';
import { getGlobalContext, type CommandContext } from '../lib/context.js';
import { findEvents } from '../lib/events.js';
import { addFilterOptions, type FilterOptions, filtersFromOptions } from '../lib/options.js';

export type CountCommandOptions = FilterOptions;

/**
 * Register the count command
 */
export function registerCountCommand(parent: Command): void {
  const command = parent.command('count').description('Count events matching the filters');
  addFilterOptions(command).action(async (options: CountCommandOptions) => {
    const context = getGlobalContext();
    const count = await executeCount(options, context);
    process.stdout.write(context.config.json ? `${JSON.stringify({ count })}\n` : `${count}\n`);
    context.logger.commandEnd(true, { count });
  });
}

/**
 * Execute the count command
 */
export async function executeCount(options: CountCommandOptions, context: CommandContext): Promise<number> {
  context.logger.commandStart('count');
  const filters = filtersFromOptions(options);

  if (filters.country !== undefined) {
    const events = await findEvents(filters, context, { scenario: options.scenario, bufferKm: options.buffer });
    return events.length;
  }
  return context.client.count(filters, { signal: context.signal });
}
