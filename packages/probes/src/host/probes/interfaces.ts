import { PRIVATE_IP_MASK } from '@edge-debug/shared';
import { FieldSet, distinctName, toFieldName } from '../../fields.js';
import { isPrivateAddress } from '../../net.js';
import type { ProbeHandler } from '../../types.js';

/**
 * Lists every external interface address as `<iface>.<ipv4|ipv6>.<n>`.
 * Addresses in private or link-local ranges are masked; their presence
 * still shows up in the field set. Interface names that clean up to the
 * same segment get a numeric suffix.
 */
export const interfaces: ProbeHandler = async (ctx) => {
  const fields = new FieldSet();
  const all = ctx.host.networkInterfaces();
  const segments = new Set<string>();
  let interfaceCount = 0;

  for (const name of Object.keys(all).sort()) {
    const external = (all[name] ?? []).filter((addr) => !addr.internal);
    if (external.length === 0) continue;
    interfaceCount += 1;

    const segment = distinctName(toFieldName(name), segments);
    segments.add(segment);

    const counters = { ipv4: 0, ipv6: 0 };
    for (const addr of external) {
      const family = addr.family === 'IPv4' ? 'ipv4' : 'ipv6';
      const field = `${segment}.${family}.${counters[family]}`;
      counters[family] += 1;
      if (isPrivateAddress(addr.address)) {
        fields.addSensitive(field, addr.address, PRIVATE_IP_MASK);
      } else {
        fields.add(field, addr.address);
      }
    }
  }

  return fields.add('interface_count', interfaceCount).toFields();
};
