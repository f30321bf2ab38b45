import type { ProbeSuite } from '../types.js';
import { edgeManifest } from './manifest.js';
import { bandwidth } from './probes/bandwidth.js';
import { dns } from './probes/dns.js';
import { geoip } from './probes/geoip.js';
import { popAssignments } from './probes/pop-assignments.js';
import { popLatency } from './probes/pop-latency.js';
import { request } from './probes/request.js';
import { resolver } from './probes/resolver.js';
import { tcpinfo } from './probes/tcpinfo.js';
import { tls } from './probes/tls.js';

export const edgeSuite: ProbeSuite = {
  manifest: edgeManifest,
  handlers: {
    'edge.dns': dns,
    'edge.tls': tls,
    'edge.request': request,
    'edge.resolver': resolver,
    'edge.geoip': geoip,
    'edge.pop_assignments': popAssignments,
    'edge.pop_latency': popLatency,
    'edge.tcpinfo': tcpinfo,
    'edge.bandwidth': bandwidth,
  },
};
