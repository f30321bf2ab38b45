import type { ProbeSuite } from '../types.js';
import { hostManifest } from './manifest.js';
import { interfaces } from './probes/interfaces.js';
import { platform } from './probes/platform.js';
import { resolvers } from './probes/resolvers.js';

export const hostSuite: ProbeSuite = {
  manifest: hostManifest,
  handlers: {
    'host.platform': platform,
    'host.interfaces': interfaces,
    'host.resolvers': resolvers,
  },
};
