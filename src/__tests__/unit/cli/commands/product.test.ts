/**
 * Product Command Tests
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { executeProduct, type ProductCommandOptions } from '../../../../cli/commands/product.js';
import { ArgumentConflictError, ConnectionError } from '../../../../core/errors.js';
import { StubTransport, testContext } from '../../../utils/cli-context.js';
import { detailFeature, loadFixture } from '../../../utils/fixtures.js';

const SEARCH = 'https://earthquake.usgs.gov/fdsnws/event/1/query';
const SHAKEMAP_PREFIX = 'https://earthquake.usgs.gov/product/shakemap/xx00000001/xx/';

function detailURL(id: string): string {
  return `${SEARCH}?format=geojson&eventid=${id}&includesuperseded=true&includedeleted=false`;
}

function catalogResponses(url: string): unknown {
  const id = new URL(url).searchParams.get('eventid');
  if (id !== null) {
    return id === 'xx00000001' ? loadFixture('detail-event.json') : detailFeature({ id, time: 1700003600000 });
  }
  return loadFixture('search-response.json');
}

describe('executeProduct', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'quakecat-product-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<ProductCommandOptions> = {}): ProductCommandOptions {
    return { getSource: 'preferred', getVersion: 'preferred', outputDir, ...overrides };
  }

  it('should list every content URL of the preferred version', async () => {
    const transport = new StubTransport(catalogResponses);

    const result = await executeProduct(
      'shakemap',
      [],
      options({ eventId: 'xx00000001', listUrl: true }),
      testContext(transport)
    );

    expect(result.urls).toEqual([
      `${SHAKEMAP_PREFIX}1700002000000/download/grid.xml`,
      `${SHAKEMAP_PREFIX}1700002000000/download/uncertainty_grid.xml`,
      `${SHAKEMAP_PREFIX}1700002000000/download/intensity.jpg`,
    ]);
    expect(result.files).toEqual([]);
    expect(transport.urls).toEqual([detailURL('xx00000001')]);
  });

  it('should list matching URLs for every version', async () => {
    const transport = new StubTransport(catalogResponses);

    const result = await executeProduct(
      'shakemap',
      ['grid.xml'],
      options({ eventId: 'xx00000001', listUrl: true, getVersion: 'all' }),
      testContext(transport)
    );

    expect(result.urls).toEqual([
      `${SHAKEMAP_PREFIX}1700001000000/download/grid.xml`,
      `${SHAKEMAP_PREFIX}1700002000000/download/grid.xml`,
    ]);
  });

  it('should download into a per-event directory', async () => {
    const transport = new StubTransport(catalogResponses);

    const result = await executeProduct(
      'shakemap',
      ['grid.xml'],
      options({ eventId: 'xx00000001' }),
      testContext(transport)
    );

    const filePath = join(outputDir, 'xx00000001', 'xx00000001_xx_2_grid.xml');
    expect(result.files).toEqual([filePath]);
    await expect(readFile(filePath, 'utf-8')).resolves.toBe(`${SHAKEMAP_PREFIX}1700002000000/download/grid.xml`);
  });

  it('should name files by version when downloading all versions', async () => {
    const transport = new StubTransport(catalogResponses);

    const result = await executeProduct(
      'shakemap',
      ['grid.xml'],
      options({ eventId: 'xx00000001', getVersion: 'all' }),
      testContext(transport)
    );

    expect(result.files).toEqual([
      join(outputDir, 'xx00000001', 'xx00000001_xx_1_grid.xml'),
      join(outputDir, 'xx00000001', 'xx00000001_xx_2_grid.xml'),
    ]);
  });

  it('should skip searched events without the product', async () => {
    const transport = new StubTransport(catalogResponses);

    const result = await executeProduct(
      'shakemap',
      ['grid.xml'],
      options({ magRange: [5, 9] }),
      testContext(transport)
    );

    expect(result.skipped).toEqual(['xx00000002']);
    expect(result.files).toEqual([join(outputDir, 'xx00000001', 'xx00000001_xx_2_grid.xml')]);
    expect(new URL(transport.urls[0] ?? '').searchParams.get('producttype')).toBe('shakemap');
    expect(transport.urls.slice(1, 3)).toEqual([detailURL('xx00000001'), detailURL('xx00000002')]);
  });

  it('should skip searched events whose detail request fails', async () => {
    const transport = new StubTransport((url) => {
      if (url === detailURL('xx00000002')) {
        throw new Error('boom');
      }
      return catalogResponses(url);
    });

    const result = await executeProduct(
      'shakemap',
      [],
      options({ magRange: [5, 9], listUrl: true }),
      testContext(transport)
    );

    expect(result.urls).toEqual([
      `${SHAKEMAP_PREFIX}1700002000000/download/grid.xml`,
      `${SHAKEMAP_PREFIX}1700002000000/download/uncertainty_grid.xml`,
      `${SHAKEMAP_PREFIX}1700002000000/download/intensity.jpg`,
    ]);
    expect(result.skipped).toEqual([]);
  });

  it('should fail when every searched event fails', async () => {
    const transport = new StubTransport((url) => {
      if (new URL(url).searchParams.has('eventid')) {
        throw new Error('boom');
      }
      return catalogResponses(url);
    });

    await expect(
      executeProduct('shakemap', [], options({ magRange: [5, 9], listUrl: true }), testContext(transport))
    ).rejects.toThrow(ConnectionError);
  });

  it('should continue past failed downloads', async () => {
    const transport = new StubTransport(catalogResponses, (url) => {
      throw new ConnectionError(url, 'HTTP 404 Not Found', { statusCode: 404 });
    });

    const result = await executeProduct(
      'shakemap',
      ['grid.xml'],
      options({ eventId: 'xx00000001' }),
      testContext(transport)
    );

    expect(result.files).toEqual([]);
  });

  it('should require a content pattern outside list mode', async () => {
    const transport = new StubTransport(catalogResponses);

    await expect(
      executeProduct('shakemap', [], options({ eventId: 'xx00000001' }), testContext(transport))
    ).rejects.toThrow(ArgumentConflictError);
    expect(transport.urls).toEqual([]);
  });

  it('should fail for a single event without the product', async () => {
    const transport = new StubTransport(catalogResponses);

    await expect(
      executeProduct('dyfi', ['cdi_zip.xml'], options({ eventId: 'xx00000001' }), testContext(transport))
    ).rejects.toThrow('Event xx00000001 has no product of type dyfi');
  });
});
