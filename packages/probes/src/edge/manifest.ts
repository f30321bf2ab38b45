import type { SuiteManifest } from '@edge-debug/shared';

export const edgeManifest: SuiteManifest = {
  name: 'edge',
  version: '0.1.0',
  description:
    'Connectivity to the CDN edge: DNS, TLS, request view, resolver, GeoIP, ' +
    'POP assignment and latency, TCP info, bandwidth',
  probes: [
    {
      name: 'dns',
      description: 'Resolve the debug host through the system resolver',
      timeout: 5_000,
    },
    {
      name: 'tls',
      description: 'TLS handshake with the debug host: protocol, cipher and certificate',
      timeout: 8_000,
    },
    {
      name: 'request',
      description:
        'How the edge saw our request: serving datacenter, X-Forwarded-For, headers sent',
    },
    {
      name: 'resolver',
      description: 'DNS resolver and client address as observed by the analytics endpoint',
    },
    {
      name: 'geoip',
      description: 'GeoIP data for the client address',
    },
    {
      name: 'pop_assignments',
      description: 'POP chosen for each address-resolution method',
    },
    {
      name: 'pop_latency',
      description: 'Round-trip time to each candidate POP',
      timeout: 30_000,
    },
    {
      name: 'tcpinfo',
      description: 'Server-side TCP statistics for the connection',
    },
    {
      name: 'bandwidth',
      description: 'Approximate download bandwidth from the edge',
      timeout: 30_000,
    },
  ],
};
