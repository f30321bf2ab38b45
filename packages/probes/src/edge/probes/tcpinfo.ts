import { z } from 'zod';
import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { debugUrl, fetchJson } from '../http.js';

export const TcpInfo = z.object({
  cwnd: z.number(),
  nexthop: z.string(),
  /** Microseconds */
  rtt: z.number(),
  delta_retrans: z.number(),
  total_retrans: z.number(),
});
export type TcpInfo = z.infer<typeof TcpInfo>;

/** Server-side TCP statistics for our connection. */
export const tcpinfo: ProbeHandler = async (ctx) => {
  const info = await fetchJson(ctx, debugUrl(ctx, '/tcpinfo'), TcpInfo);

  return new FieldSet()
    .add('cwnd', info.cwnd)
    .add('nexthop', info.nexthop)
    .add('rtt_ms', info.rtt / 1000)
    .add('delta_retrans', info.delta_retrans)
    .add('total_retrans', info.total_retrans)
    .toFields();
};
