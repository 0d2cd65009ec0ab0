/**
 * quakecat CLI Configuration Management
 *
 * Loads configuration from .quakecatrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (QUAKECAT_*)
 * 3. Config file (--config, QUAKECAT_CONFIG, or .quakecatrc found upward from cwd)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { BUFFER_DISTANCE_KM, DEFAULT_HOST, REQUEST_TIMEOUT_MS, SEARCH_LIMIT } from '../../core/constants.js';
import { DEFAULT_FREQUENCY_TABLE, type FrequencyTable } from '../../search/time-segments.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface ComCatServiceConfig {
  readonly host: string;
  /** Request timeout in milliseconds */
  readonly timeout: number;
}

export interface DefaultsConfig {
  /** Parallel detail requests */
  readonly concurrency: number;
  /** Padding around country outlines, km */
  readonly bufferKm: number;
}

export interface SearchConfig {
  /** Server ceiling on events per request */
  readonly limit: number;
  /** Expected events/day for magnitudes 0..9 */
  readonly frequencyTable: FrequencyTable;
}

export interface PathsConfig {
  /** GeoJSON FeatureCollection of country outlines */
  readonly countries: string | null;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly services: { readonly comcat: ComCatServiceConfig };
  readonly defaults: DefaultsConfig;
  readonly search: SearchConfig;
  readonly paths: PathsConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigError extends Error {
  readonly configPath: string | null;

  constructor(message: string, configPath: string | null = null) {
    super(message);
    this.name = 'ConfigError';
    this.configPath = configPath;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

// ============================================================================
// Config File Schema
// ============================================================================

const FrequencyTableSchema = z.tuple([
  z.number().positive(), z.number().positive(), z.number().positive(), z.number().positive(),
  z.number().positive(), z.number().positive(), z.number().positive(), z.number().positive(),
  z.number().positive(), z.number().positive(),
]);

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    services: z
      .object({
        comcat: z
          .object({
            host: z.string().min(1).optional(),
            timeout: z.number().int().positive().optional(),
          })
          .optional(),
      })
      .optional(),
    defaults: z
      .object({
        concurrency: z.number().int().min(1).max(100).optional(),
        bufferKm: z.number().nonnegative().optional(),
      })
      .optional(),
    search: z
      .object({
        limit: z.number().int().positive().optional(),
        frequencyTable: FrequencyTableSchema.optional(),
      })
      .optional(),
    paths: z.object({ countries: z.string().optional() }).optional(),
  })
  .passthrough();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  services: {
    comcat: {
      host: DEFAULT_HOST,
      timeout: REQUEST_TIMEOUT_MS,
    },
  },
  defaults: {
    concurrency: 5,
    bufferKm: BUFFER_DISTANCE_KM,
  },
  search: {
    limit: SEARCH_LIMIT,
    frequencyTable: DEFAULT_FREQUENCY_TABLE,
  },
  paths: {
    countries: null,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.quakecatrc', '.quakecatrc.yaml', '.quakecatrc.yml', '.quakecatrc.json'];

/**
 * Find config file in a directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Could not read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new ConfigError(
      `Invalid config file ${filePath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`,
      filePath
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    host?: string;
    timeout?: number;
    concurrency?: number;
    bufferKm?: number;
    countries?: string;
  };
  /** Environment (default process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory the config search starts from (default cwd) */
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} For a missing explicit file or invalid contents
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const getEnvVar = (name: string): string | undefined => env[`QUAKECAT_${name}`];
  const getEnvNumber = (name: string): number | undefined => {
    const value = getEnvVar(name);
    if (value === undefined || value.trim() === '') return undefined;
    const num = Number(value);
    if (!Number.isFinite(num)) {
      throw new ConfigError(`QUAKECAT_${name} must be a number, got "${value}"`);
    }
    return num;
  };
  const getEnvBool = (name: string): boolean | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  };

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};
  const cwd = options.cwd ?? process.cwd();
  const runtimeCountries = overrides.countries ?? getEnvVar('COUNTRIES');
  const fileCountries = fileConfig.paths?.countries;
  // file paths resolve against the config file's directory
  let countries: string | null = null;
  if (runtimeCountries !== undefined) {
    countries = resolve(cwd, runtimeCountries);
  } else if (fileCountries !== undefined) {
    countries = resolve(configPath ? dirname(configPath) : cwd, fileCountries);
  }

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,
    services: {
      comcat: {
        host:
          overrides.host ??
          getEnvVar('HOST') ??
          fileConfig.services?.comcat?.host ??
          DEFAULT_CONFIG.services.comcat.host,
        timeout:
          overrides.timeout ??
          getEnvNumber('TIMEOUT') ??
          fileConfig.services?.comcat?.timeout ??
          DEFAULT_CONFIG.services.comcat.timeout,
      },
    },
    defaults: {
      concurrency:
        overrides.concurrency ??
        getEnvNumber('CONCURRENCY') ??
        fileConfig.defaults?.concurrency ??
        DEFAULT_CONFIG.defaults.concurrency,
      bufferKm:
        overrides.bufferKm ??
        getEnvNumber('BUFFER_KM') ??
        fileConfig.defaults?.bufferKm ??
        DEFAULT_CONFIG.defaults.bufferKm,
    },
    search: {
      limit: getEnvNumber('SEARCH_LIMIT') ?? fileConfig.search?.limit ?? DEFAULT_CONFIG.search.limit,
      frequencyTable: fileConfig.search?.frequencyTable ?? DEFAULT_CONFIG.search.frequencyTable,
    },
    paths: { countries },
    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * @throws {ConfigError} If a merged value is out of range
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigError(`Unsupported config version: ${config.version}. Expected 1.`, config.configPath);
  }
  if (config.services.comcat.timeout <= 0) {
    throw new ConfigError('Timeout must be a positive number', config.configPath);
  }
  if (!Number.isInteger(config.defaults.concurrency) || config.defaults.concurrency <= 0 || config.defaults.concurrency > 100) {
    throw new ConfigError('Concurrency must be an integer between 1 and 100', config.configPath);
  }
  if (config.defaults.bufferKm < 0) {
    throw new ConfigError('Buffer distance must not be negative', config.configPath);
  }
  if (!Number.isInteger(config.search.limit) || config.search.limit <= 0) {
    throw new ConfigError('Search limit must be a positive integer', config.configPath);
  }
}
