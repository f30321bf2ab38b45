import { z } from 'zod';
import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { analyticsUrl, fetchJson } from '../http.js';

const AsNumber = z.union([z.number(), z.string()]);

export const ResolverInfo = z.object({
  dns_resolver_info: z.object({
    ip: z.string(),
    as_name: z.string().optional(),
    as_number: AsNumber.optional(),
    cc: z.string().optional(),
  }),
  client_ip_info: z.object({
    ip: z.string(),
    as_name: z.string().optional(),
    as_number: AsNumber.optional(),
  }),
});
export type ResolverInfo = z.infer<typeof ResolverInfo>;

/**
 * Ask the analytics endpoint which DNS resolver looked up our unique
 * hostname, and which client address the request came from.
 */
export const resolver: ProbeHandler = async (ctx) => {
  const info = await fetchJson(ctx, analyticsUrl(ctx, '/debug_resolver'), ResolverInfo);
  const dnsInfo = info.dns_resolver_info;
  const client = info.client_ip_info;

  return new FieldSet()
    .add('resolver_ip', dnsInfo.ip)
    .addOptional('resolver_as_name', dnsInfo.as_name)
    .addOptional('resolver_as_number', dnsInfo.as_number)
    .addOptional('resolver_country_code', dnsInfo.cc)
    .add('client_ip', client.ip)
    .addOptional('client_as_name', client.as_name)
    .addOptional('client_as_number', client.as_number)
    .toFields();
};
