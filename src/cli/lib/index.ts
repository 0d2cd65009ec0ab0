/**
 * CLI Library Index
 *
 * @module cli/lib
 */

export * from './config.js';
export * from './context.js';
export * from './events.js';
export * from './exit-codes.js';
export * from './logger.js';
export * from './options.js';
export * from './output.js';
