/**
 * CLI Commands Index
 *
 * Central registry of all CLI commands.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCountCommand } from './count.js';
import { registerFindIdCommand } from './findid.js';
import { registerHistoryCommand } from './history.js';
import { registerProductCommand } from './product.js';
import { registerSearchCommand } from './search.js';

export { executeSearch, registerSearchCommand, type SearchCommandOptions } from './search.js';
export { executeCount, registerCountCommand, type CountCommandOptions } from './count.js';
export {
  executeProduct,
  registerProductCommand,
  type ProductCommandOptions,
  type ProductCommandResult,
} from './product.js';
export {
  executeHistory,
  registerHistoryCommand,
  selectProductTypes,
  type HistoryCommandOptions,
  type HistoryTables,
} from './history.js';
export { executeFindId, matchTable, MATCH_COLUMNS, registerFindIdCommand, type FindIdCommandOptions } from './findid.js';

/**
 * Register every command on the program
 */
export function registerCommands(program: Command): void {
  registerSearchCommand(program);
  registerCountCommand(program);
  registerProductCommand(program);
  registerHistoryCommand(program);
  registerFindIdCommand(program);
}
