import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';

/** Resolve the debug host the way the OS resolver would. */
export const dns: ProbeHandler = async (ctx) => {
  const host = ctx.endpoints.debugHost;
  const addresses = await ctx.lookup(host);
  const first = addresses[0];
  if (!first) {
    throw new Error(`No addresses returned for ${host}`);
  }

  return new FieldSet()
    .add('resolved_ip', first)
    .add('address_count', addresses.length)
    .toFields();
};
