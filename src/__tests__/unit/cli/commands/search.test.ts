/**
 * Search and Count Command Tests
 */

import { describe, it, expect } from 'vitest';
import { executeSearch } from '../../../../cli/commands/search.js';
import { executeCount } from '../../../../cli/commands/count.js';
import { createContext } from '../../../../cli/lib/context.js';
import { ConfigError } from '../../../../cli/lib/config.js';
import { createCLILogger } from '../../../../cli/lib/logger.js';
import { ArgumentConflictError } from '../../../../core/errors.js';
import { SUMMARY_COLUMNS } from '../../../../models/summary-event.js';
import { DETAIL_COLUMNS } from '../../../../tabular/event-rows.js';
import { StubTransport, testConfig, testContext } from '../../../utils/cli-context.js';
import { detailFeature, featureCollection, loadFixture, summaryFeature } from '../../../utils/fixtures.js';

const DETAIL_PREFIX = 'https://earthquake.usgs.gov/earthquakes/feed/v1.0/detail/';

/** Search fixture for queries; the detail fixture for xx00000001; a bare detail otherwise */
function catalogResponses(url: string): unknown {
  if (url.startsWith(DETAIL_PREFIX)) {
    const id = url.slice(DETAIL_PREFIX.length).replace('.geojson', '');
    return id === 'xx00000001' ? loadFixture('detail-event.json') : detailFeature({ id, time: 1700003600000 });
  }
  return loadFixture('search-response.json');
}

describe('executeSearch', () => {
  it('should tabulate summary events', async () => {
    const transport = new StubTransport(catalogResponses);

    const table = await executeSearch({ format: 'csv', magRange: [5, 9] }, testContext(transport));

    expect(table.columns).toEqual([...SUMMARY_COLUMNS]);
    expect(table.rows.map((row) => row['id'])).toEqual(['xx00000001', 'xx00000002']);
    expect(transport.urls).toHaveLength(1);
    expect(new URL(transport.urls[0] ?? '').searchParams.get('minmagnitude')).toBe('5');
  });

  it('should fetch details when tensors are requested', async () => {
    const transport = new StubTransport(catalogResponses);

    const table = await executeSearch(
      { format: 'csv', magRange: [5, 9], tensors: 'preferred' },
      testContext(transport)
    );

    expect(table.columns.slice(0, DETAIL_COLUMNS.length)).toEqual([...DETAIL_COLUMNS]);
    expect(table.columns).toContain('xx_Mww_mrr');
    expect(table.rows[0]?.['xx_Mww_mrr']).toBe(1.5e17);
    expect(table.rows[1]?.['xx_Mww_mrr']).toBeUndefined();
    expect(transport.urls).toHaveLength(3);
  });

  it('should trim country searches to the outline', async () => {
    const transport = new StubTransport(() =>
      featureCollection([
        summaryFeature({ id: 'xx00000200', time: 1700000000000, latitude: 1, longitude: 11 }),
        summaryFeature({ id: 'xx00000201', time: 1700000001000, latitude: 1, longitude: 14 }),
      ])
    );

    const table = await executeSearch(
      { format: 'csv', magRange: [5, 9], country: 'tst' },
      testContext(transport, { countries: true })
    );

    expect(table.rows.map((row) => row['id'])).toEqual(['xx00000200']);
    expect(new URL(transport.urls[0] ?? '').searchParams.get('minlatitude')).not.toBeNull();
  });

  it('should reject unknown countries', async () => {
    const context = testContext(new StubTransport(catalogResponses), { countries: true });

    await expect(executeSearch({ format: 'csv', country: 'XYZ' }, context)).rejects.toThrow(ArgumentConflictError);
    await expect(executeSearch({ format: 'csv', country: 'XYZ' }, context)).rejects.toThrow(
      'Unknown country code "XYZ"'
    );
  });

  it('should need a countries file for country searches', async () => {
    const context = createContext(testConfig(), createCLILogger({ level: 'error', write: () => undefined }));

    await expect(executeSearch({ format: 'csv', country: 'TST' }, context)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('executeCount', () => {
  it('should use the count endpoint', async () => {
    const transport = new StubTransport(() => ({ count: 42 }));

    await expect(executeCount({ magRange: [5, 9] }, testContext(transport))).resolves.toBe(42);
    expect(transport.urls[0]).toMatch(/^https:\/\/earthquake\.usgs\.gov\/fdsnws\/event\/1\/count\?/);
  });

  it('should count the trimmed events for a country', async () => {
    const transport = new StubTransport(() =>
      featureCollection([
        summaryFeature({ id: 'xx00000210', time: 1700000000000, latitude: 1, longitude: 11 }),
        summaryFeature({ id: 'xx00000211', time: 1700000001000, latitude: 1, longitude: 14 }),
      ])
    );

    await expect(
      executeCount({ magRange: [5, 9], country: 'TST' }, testContext(transport, { countries: true }))
    ).resolves.toBe(1);
  });
});
