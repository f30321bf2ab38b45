import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { analyticsUrl, debugUrl, timedDownload } from '../http.js';

/**
 * Megabits per second for `bytes` transferred in `transferMs`, after
 * subtracting the request overhead measured on an empty response. When the
 * overhead is not smaller than the transfer, the raw transfer time is used.
 */
export function estimateMbps(bytes: number, transferMs: number, overheadMs: number): number {
  const effectiveMs = transferMs > overheadMs ? transferMs - overheadMs : transferMs;
  if (effectiveMs <= 0) {
    throw new Error('Transfer completed too quickly to measure');
  }
  const mbps = (bytes * 8) / (effectiveMs * 1000);
  return Math.round(mbps * 100) / 100;
}

/** Approximate download bandwidth from the edge. */
export const bandwidth: ProbeHandler = async (ctx) => {
  const overhead = await timedDownload(ctx, analyticsUrl(ctx, '/generate_204'));
  const transfer = await timedDownload(ctx, debugUrl(ctx, '/speedtest'));

  const declared = Number(transfer.response.headers.get('content-length'));
  const bytes = transfer.bytes > 0 ? transfer.bytes : Number.isFinite(declared) ? declared : 0;
  if (bytes === 0) {
    throw new Error('/speedtest returned an empty body');
  }

  return new FieldSet()
    .add('bytes', bytes)
    .add('bandwidth_mbps', estimateMbps(bytes, transfer.elapsedMs, overhead.elapsedMs))
    .toFields();
};
