/**
 * CLI Configuration Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../../../cli/lib/config.js';

const FILE_CONFIG = `
version: 1
services:
  comcat:
    host: file.example.test
    timeout: 1000
defaults:
  concurrency: 3
search:
  frequencyTable: [100, 50, 20, 10, 5, 1, 0.5, 0.1, 0.01, 0.001]
paths:
  countries: data/countries.json
`;

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'quakecat-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    const config = loadConfig({ env: {}, cwd: dir });
    expect(config.services.comcat).toEqual(DEFAULT_CONFIG.services.comcat);
    expect(config.defaults).toEqual({ concurrency: 5, bufferKm: 100 });
    expect(config.search.limit).toBe(20000);
    expect(config.paths.countries).toBeNull();
    expect(config.configPath).toBeNull();
    expect(config.verbose).toBe(false);
  });

  it('should read a YAML file found in the working directory', async () => {
    await writeFile(join(dir, '.quakecatrc'), FILE_CONFIG);

    const config = loadConfig({ env: {}, cwd: dir });
    expect(config.configPath).toBe(join(dir, '.quakecatrc'));
    expect(config.services.comcat).toEqual({ host: 'file.example.test', timeout: 1000 });
    expect(config.defaults.concurrency).toBe(3);
    expect(config.search.frequencyTable[0]).toBe(100);
    expect(config.paths.countries).toBe(join(dir, 'data', 'countries.json'));
  });

  it('should let the environment override the file', async () => {
    await writeFile(join(dir, '.quakecatrc'), FILE_CONFIG);

    const config = loadConfig({
      env: { QUAKECAT_HOST: 'env.example.test', QUAKECAT_CONCURRENCY: '8', QUAKECAT_VERBOSE: 'true' },
      cwd: dir,
    });
    expect(config.services.comcat.host).toBe('env.example.test');
    expect(config.services.comcat.timeout).toBe(1000);
    expect(config.defaults.concurrency).toBe(8);
    expect(config.verbose).toBe(true);
  });

  it('should let flags override the environment', async () => {
    await writeFile(join(dir, '.quakecatrc'), FILE_CONFIG);

    const config = loadConfig({
      env: { QUAKECAT_HOST: 'env.example.test', QUAKECAT_COUNTRIES: 'env.json' },
      cwd: dir,
      overrides: { host: 'flag.example.test', countries: 'flag.json', json: true },
    });
    expect(config.services.comcat.host).toBe('flag.example.test');
    expect(config.paths.countries).toBe(join(dir, 'flag.json'));
    expect(config.json).toBe(true);
  });

  it('should read an explicit JSON file', async () => {
    await writeFile(join(dir, 'custom.json'), JSON.stringify({ defaults: { bufferKm: 25 } }));

    const config = loadConfig({ env: {}, cwd: dir, configPath: 'custom.json' });
    expect(config.configPath).toBe(join(dir, 'custom.json'));
    expect(config.defaults.bufferKm).toBe(25);
  });

  it('should report a missing explicit file', () => {
    expect(() => loadConfig({ env: {}, cwd: dir, configPath: 'absent.yaml' })).toThrow(
      `Config file not found: ${join(dir, 'absent.yaml')}`
    );
  });

  it('should report invalid file contents with the field path', async () => {
    await writeFile(join(dir, '.quakecatrc'), 'defaults:\n  concurrency: 0\n');

    expect(() => loadConfig({ env: {}, cwd: dir })).toThrow(ConfigError);
    expect(() => loadConfig({ env: {}, cwd: dir })).toThrow(
      `Invalid config file ${join(dir, '.quakecatrc')}: defaults.concurrency: Number must be greater than or equal to 1`
    );
  });

  it('should reject non-numeric environment values', () => {
    expect(() => loadConfig({ env: { QUAKECAT_TIMEOUT: 'soon' }, cwd: dir })).toThrow(
      'QUAKECAT_TIMEOUT must be a number, got "soon"'
    );
  });

  it('should validate merged values', () => {
    expect(() => loadConfig({ env: {}, cwd: dir, overrides: { timeout: -5 } })).toThrow(
      'Timeout must be a positive number'
    );
    expect(() => loadConfig({ env: {}, cwd: dir, overrides: { concurrency: 500 } })).toThrow(
      'Concurrency must be an integer between 1 and 100'
    );
  });
});
