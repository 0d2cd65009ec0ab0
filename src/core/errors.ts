/**
 * quakecat Error Types
 *
 * Every error raised by the library extends QuakeCatalogError so callers can
 * separate catalog failures from programming errors with one instanceof check.
 *
 * RECOVERY:
 * - ConnectionError: transient on the server side; retry later
 * - ParsingError: the server answered with a document we do not understand
 * - ProductNotFoundError / ContentNotFoundError: the event lacks that data
 * - ArgumentConflictError / InvalidRangeError / UndefinedVersionError: fix the call
 */

/**
 * Base class for all quakecat errors
 */
export class QuakeCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuakeCatalogError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Transport failure: non-2xx response, network error or timeout,
 * after the retry budget is spent.
 */
export class ConnectionError extends QuakeCatalogError {
  readonly url: string;
  readonly statusCode: number | null;
  override readonly cause: Error | undefined;

  constructor(url: string, message: string, options?: { statusCode?: number; cause?: Error }) {
    super(`Could not retrieve ${url}: ${message}`);
    this.name = 'ConnectionError';
    this.url = url;
    this.statusCode = options?.statusCode ?? null;
    this.cause = options?.cause;
  }
}

/**
 * Malformed or unexpected document shape from an otherwise-successful response
 */
export class ParsingError extends QuakeCatalogError {
  readonly url: string | null;
  readonly issues: readonly string[];

  constructor(message: string, options?: { url?: string; issues?: readonly string[] }) {
    super(options?.url ? `${message} (${options.url})` : message);
    this.name = 'ParsingError';
    this.url = options?.url ?? null;
    this.issues = options?.issues ?? [];
  }
}

/**
 * A requested product type or source has no non-deleted submissions
 */
export class ProductNotFoundError extends QuakeCatalogError {
  readonly productType: string;
  readonly source: string | null;

  constructor(message: string, productType: string, source?: string) {
    super(message);
    this.name = 'ProductNotFoundError';
    this.productType = productType;
    this.source = source ?? null;
  }
}

/**
 * An operation needing exactly one product type received several
 */
export class ProductNotSpecifiedError extends QuakeCatalogError {
  readonly candidates: readonly string[];

  constructor(message: string, candidates: readonly string[]) {
    super(message);
    this.name = 'ProductNotSpecifiedError';
    this.candidates = candidates;
  }
}

/**
 * No content file in a product matches the requested pattern
 */
export class ContentNotFoundError extends QuakeCatalogError {
  readonly pattern: string;

  constructor(pattern: string, productType: string) {
    super(`Could not find any content matching "${pattern}" in ${productType} product`);
    this.name = 'ContentNotFoundError';
    this.pattern = pattern;
  }
}

/**
 * Mutually exclusive or invalid filter combination
 */
export class ArgumentConflictError extends QuakeCatalogError {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentConflictError';
  }
}

/**
 * Time range with start after end, or non-finite bounds
 */
export class InvalidRangeError extends QuakeCatalogError {
  readonly start: Date;
  readonly end: Date;

  constructor(start: Date, end: Date, reason?: string) {
    super(
      reason ??
        `Invalid time range: start ${formatInstant(start)} is after end ${formatInstant(end)}`
    );
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

/**
 * Unknown version selector
 */
export class UndefinedVersionError extends QuakeCatalogError {
  readonly version: string;

  constructor(version: string) {
    super(`No version defined for "${version}" (expected preferred, first, last or all)`);
    this.name = 'UndefinedVersionError';
    this.version = version;
  }
}

/**
 * Property lookup on an event or product that does not carry it
 */
export class PropertyNotFoundError extends QuakeCatalogError {
  readonly key: string;

  constructor(key: string, owner: string) {
    super(`No property ${key} found for ${owner}`);
    this.name = 'PropertyNotFoundError';
    this.key = key;
  }
}

/**
 * Operation interrupted through its AbortSignal
 */
export class CancelledError extends QuakeCatalogError {
  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'CancelledError';
  }
}

/**
 * Throw CancelledError when the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation);
  }
}

function formatInstant(date: Date): string {
  return Number.isNaN(date.getTime()) ? 'Invalid Date' : date.toISOString();
}
