import type { SuiteManifest } from '@edge-debug/shared';

export const hostManifest: SuiteManifest = {
  name: 'host',
  version: '0.1.0',
  description: 'Local host facts: platform, network interfaces, configured DNS servers',
  probes: [
    {
      name: 'platform',
      description: 'Operating system, kernel release and CPU architecture',
      timeout: 2_000,
    },
    {
      name: 'interfaces',
      description: 'Non-loopback interface addresses (private ranges masked)',
      timeout: 2_000,
    },
    {
      name: 'resolvers',
      description: 'DNS servers configured on this host',
      timeout: 2_000,
    },
  ],
};
