import { z } from 'zod';
import type { ProbeContext } from '../types.js';
import { analyticsUrl, fetchOk, parseWith } from './http.js';
import { parseJsonp } from './jsonp.js';

export const PERFMAP_CALLBACK = 'FASTLY.setupPerfmap';

export const PerfmapPop = z.object({
  hostname: z.string(),
  popId: z.coerce.string(),
});
export type PerfmapPop = z.infer<typeof PerfmapPop>;

export const PerfmapDomain = z.object({
  hostname: z.string(),
  type: z.string(),
});
export type PerfmapDomain = z.infer<typeof PerfmapDomain>;

/** Perfmap config: POPs to time, domains to ask for their POP, and GeoIP */
export const PerfmapConfig = z.object({
  geo_ip: z.record(z.unknown()).default({}),
  pops: z.array(PerfmapPop).default([]),
  domains: z.array(PerfmapDomain).default([]),
});
export type PerfmapConfig = z.infer<typeof PerfmapConfig>;

export function perfmapUrl(ctx: ProbeContext): string {
  return analyticsUrl(ctx, `/perfmapconfig.js?jsonp=${PERFMAP_CALLBACK}`, '-perfmap');
}

export async function fetchPerfmap(ctx: ProbeContext): Promise<PerfmapConfig> {
  const res = await fetchOk(ctx, perfmapUrl(ctx));
  const body = await res.text();
  return parseWith(PerfmapConfig, parseJsonp(body, PERFMAP_CALLBACK), 'perfmapconfig.js');
}
