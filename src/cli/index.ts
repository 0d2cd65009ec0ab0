/**
 * quakecat CLI
 *
 * Command-line interface over the catalog client: search, count, product
 * downloads, event history and event-id lookup.
 *
 * @module cli
 */

// Re-export library utilities
export * from './lib/index.js';

// Re-export commands
export * from './commands/index.js';

export const CLI_NAME = 'quakecat';
