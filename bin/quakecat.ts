#!/usr/bin/env tsx
/**
 * quakecat CLI Entry Point
 *
 * Search the USGS ComCat catalog, download product content and tabulate
 * event histories from the command line.
 *
 * @module quakecat-cli
 */

import { Command, CommanderError } from 'commander';

import { LIBRARY_VERSION } from '../src/core/constants.js';
import { registerCommands } from '../src/cli/commands/index.js';
import { initializeContext, type CommandContext } from '../src/cli/lib/context.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { parseInteger } from '../src/cli/lib/options.js';

// ============================================================================
// Cancellation
// ============================================================================

const controller = new AbortController();

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    process.exit(EXIT_CODES.USER_CANCELLED);
  }
  controller.abort();
});

// ============================================================================
// CLI Setup
// ============================================================================

let context: CommandContext | null = null;

function createProgram(): Command {
  const program = new Command();

  program
    .name('quakecat')
    .description('quakecat - search and reshape USGS ComCat earthquake data')
    .version(LIBRARY_VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Log as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .quakecatrc)')
    .option('--host <host>', 'ComCat host (default: earthquake.usgs.gov)')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parseInteger)
    .option('--concurrency <n>', 'Parallel detail requests', parseInteger)
    .option('--countries <file>', 'GeoJSON FeatureCollection of country outlines')
    .exitOverride()
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts();
      try {
        context = initializeContext(options, controller.signal);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);
  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const exitCode = exitCodeFor(error);
    // commander has already printed its own usage errors
    if (!(error instanceof CommanderError)) {
      const message = error instanceof Error ? error.message : String(error);
      if (context) {
        context.logger.error(message);
        context.logger.commandEnd(false, { exitCode });
      } else {
        console.error(`Error: ${message}`);
      }
    }
    process.exit(exitCode);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
