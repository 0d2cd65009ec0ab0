/**
 * Content Fetcher Tests
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ContentFetcher } from '../../../content/content-fetcher.js';
import { ConnectionError, ContentNotFoundError } from '../../../core/errors.js';
import type { Transport } from '../../../core/http-client.js';
import type { ResolvedProduct } from '../../../models/product.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { loadDetailEvent } from '../../utils/fixtures.js';

const GRID_URL = 'https://earthquake.usgs.gov/product/shakemap/xx00000001/xx/1700002000000/download/grid.xml';

class RecordingTransport implements Transport {
  readonly requested: string[] = [];

  async fetchJSON(): Promise<unknown> {
    throw new Error('not used');
  }

  async fetchBytes(url: string): Promise<Uint8Array> {
    this.requested.push(url);
    return new TextEncoder().encode(`<grid source="${url}"/>`);
  }
}

function latestShakemap(): ResolvedProduct {
  const [shakemap] = loadDetailEvent().getProducts('shakemap');
  if (!shakemap) throw new Error('no shakemap');
  return shakemap;
}

describe('ContentFetcher', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'quakecat-content-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should fetch the shortest matching file', async () => {
    const transport = new RecordingTransport();
    const fetcher = new ContentFetcher({ transport, logger: silentLogger });

    const content = await fetcher.getContentBytes(latestShakemap(), 'grid.xml');

    expect(transport.requested).toEqual([GRID_URL]);
    expect(content.fileName).toBe('grid.xml');
    expect(content.url).toBe(GRID_URL);
    expect(new TextDecoder().decode(content.data)).toBe(`<grid source="${GRID_URL}"/>`);
  });

  it('should write bytes verbatim, creating directories', async () => {
    const fetcher = new ContentFetcher({ transport: new RecordingTransport(), logger: silentLogger });
    const filePath = join(workDir, 'xx00000001', 'xx00000001_xx_2_grid.xml');

    const url = await fetcher.downloadContent(latestShakemap(), 'grid.xml', filePath);

    expect(url).toBe(GRID_URL);
    await expect(readFile(filePath, 'utf-8')).resolves.toBe(`<grid source="${GRID_URL}"/>`);
  });

  it('should not request anything when no content matches', async () => {
    const transport = new RecordingTransport();
    const fetcher = new ContentFetcher({ transport, logger: silentLogger });

    await expect(fetcher.getContentBytes(latestShakemap(), 'info.json')).rejects.toBeInstanceOf(ContentNotFoundError);
    expect(transport.requested).toEqual([]);
  });

  it('should surface download failures', async () => {
    const transport: Transport = {
      fetchJSON: async () => null,
      fetchBytes: async (url) => {
        throw new ConnectionError(url, 'HTTP 404 Not Found', { statusCode: 404 });
      },
    };
    const fetcher = new ContentFetcher({ transport, logger: silentLogger });
    const filePath = join(workDir, 'grid.xml');

    await expect(fetcher.downloadContent(latestShakemap(), 'grid.xml', filePath)).rejects.toThrow(
      `Could not retrieve ${GRID_URL}: HTTP 404 Not Found`
    );
    await expect(readFile(filePath)).rejects.toThrow();
  });
});
