import { describe, expect, it } from 'vitest';
import { createRouteFetch, createTestContext } from '../testing/context.js';
import { fetchPerfmap, perfmapUrl } from './perfmap.js';

describe('fetchPerfmap', () => {
  it('builds the per-client perfmap URL', () => {
    expect(perfmapUrl(createTestContext())).toBe(
      'https://client-1-perfmap.analytics.test/perfmapconfig.js?jsonp=FASTLY.setupPerfmap',
    );
  });

  it('parses and defaults the perfmap config', async () => {
    const body =
      "FASTLY.setupPerfmap({'geo_ip': {'country_code': 'NL'}, 'pops': [{'hostname': 'ams.pop.test', 'popId': 1}]});";
    const ctx = createTestContext({
      fetch: createRouteFetch({ [perfmapUrl(createTestContext())]: body }),
    });

    const perfmap = await fetchPerfmap(ctx);

    expect(perfmap).toEqual({
      geo_ip: { country_code: 'NL' },
      pops: [{ hostname: 'ams.pop.test', popId: '1' }],
      domains: [],
    });
  });

  it('rejects a config with malformed pops', async () => {
    const body = "FASTLY.setupPerfmap({'pops': [{'popId': 'AMS'}]});";
    const ctx = createTestContext({
      fetch: createRouteFetch({ [perfmapUrl(createTestContext())]: body }),
    });

    await expect(fetchPerfmap(ctx)).rejects.toThrow(
      'Unexpected response from perfmapconfig.js at pops.0.hostname',
    );
  });
});
