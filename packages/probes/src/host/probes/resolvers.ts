import { PRIVATE_IP_MASK } from '@edge-debug/shared';
import { FieldSet } from '../../fields.js';
import { isPrivateAddress } from '../../net.js';
import type { ProbeHandler } from '../../types.js';

/** `[addr]:port` and `a.b.c.d:port` as reported for non-default ports */
function serverAddress(server: string): string {
  const bracketed = server.match(/^\[(.+)\](?::\d+)?$/);
  if (bracketed?.[1]) return bracketed[1];
  const withPort = server.match(/^(\d+\.\d+\.\d+\.\d+):\d+$/);
  return withPort?.[1] ?? server;
}

function isPrivateServer(server: string): boolean {
  return isPrivateAddress(serverAddress(server));
}

/** DNS servers the host is configured to use, private ones masked. */
export const resolvers: ProbeHandler = async (ctx) => {
  const servers = ctx.host.dnsServers();
  const fields = new FieldSet();

  if (servers.length === 0) {
    fields.add('servers', 'none');
  } else if (servers.some(isPrivateServer)) {
    const shown = servers.map((server) => (isPrivateServer(server) ? PRIVATE_IP_MASK : server));
    fields.addMasked('servers', shown.join(','));
  } else {
    fields.add('servers', servers.join(','));
  }

  return fields.add('count', servers.length).toFields();
};
