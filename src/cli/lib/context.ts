/**
 * Per-invocation CLI context
 *
 * Built once in the program's preAction hook from the merged configuration,
 * then shared by every command.
 *
 * @module cli/lib/context
 */

import { createHTTPClient } from '../../core/http-client.js';
import { CatalogClient } from '../../search/catalog-client.js';
import { ContentFetcher } from '../../content/content-fetcher.js';
import { loadCountryCollection, type CountryFeature } from '../../search/country-bounds.js';
import { ConfigError, loadConfig, type CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly client: CatalogClient;
  readonly fetcher: ContentFetcher;
  /** Aborted on SIGINT */
  readonly signal?: AbortSignal;
  /** Country outlines, loaded on first use */
  readonly loadCountries: () => Promise<CountryFeature[]>;
}

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly host?: string;
  readonly timeout?: number;
  readonly concurrency?: number;
  readonly countries?: string;
}

let globalContext: CommandContext | null = null;

export function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Context over an already-merged configuration
 */
export function createContext(config: CLIConfig, logger: CLILogger, signal?: AbortSignal): CommandContext {
  const transport = createHTTPClient({ timeoutMs: config.services.comcat.timeout, logger });
  let countries: Promise<CountryFeature[]> | null = null;

  return {
    config,
    logger,
    signal,
    client: new CatalogClient({
      transport,
      host: config.services.comcat.host,
      logger,
      frequencyTable: config.search.frequencyTable,
      searchLimit: config.search.limit,
    }),
    fetcher: new ContentFetcher({ transport, logger }),
    loadCountries: () => {
      const path = config.paths.countries;
      if (path === null) {
        return Promise.reject(
          new ConfigError('Country searches need a countries file (--countries, QUAKECAT_COUNTRIES or paths.countries)')
        );
      }
      countries ??= loadCountryCollection(path);
      return countries;
    },
  };
}

/**
 * Load configuration and build the shared context
 *
 * @throws {ConfigError} For invalid configuration
 */
export function initializeContext(options: GlobalOptions, signal?: AbortSignal): CommandContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      host: options.host,
      timeout: options.timeout,
      concurrency: options.concurrency,
      countries: options.countries,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = createContext(config, logger, signal);
  return globalContext;
}
