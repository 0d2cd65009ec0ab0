/**
 * CLI exit codes and the mapping from library errors onto them
 *
 * @module cli/lib/exit-codes
 */

import { CommanderError } from 'commander';
import {
  ArgumentConflictError,
  CancelledError,
  ConnectionError,
  ContentNotFoundError,
  InvalidRangeError,
  ParsingError,
  ProductNotFoundError,
  ProductNotSpecifiedError,
  PropertyNotFoundError,
  UndefinedVersionError,
} from '../../core/errors.js';
import { ConfigError } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  USAGE_ERROR: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_ERROR: 5,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that escaped a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    // --help and --version exit through the same path
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }
  if (
    error instanceof ArgumentConflictError ||
    error instanceof InvalidRangeError ||
    error instanceof UndefinedVersionError
  ) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof ConnectionError) return EXIT_CODES.NETWORK_ERROR;
  if (
    error instanceof ParsingError ||
    error instanceof ProductNotFoundError ||
    error instanceof ProductNotSpecifiedError ||
    error instanceof ContentNotFoundError ||
    error instanceof PropertyNotFoundError
  ) {
    return EXIT_CODES.DATA_ERROR;
  }
  if (error instanceof CancelledError) return EXIT_CODES.USER_CANCELLED;
  return EXIT_CODES.ERRORS;
}
