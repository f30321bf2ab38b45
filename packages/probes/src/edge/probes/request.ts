import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { debugUrl, fetchOk } from '../http.js';

const XFF_RE = /xff">([^<]*)/m;

/** Datacenter code: the last three characters of X-Served-By */
export function parseDatacenter(servedBy: string): string | undefined {
  const trimmed = servedBy.trim();
  return trimmed.length >= 3 ? trimmed.slice(-3) : undefined;
}

export function parseXff(html: string): string | undefined {
  return html.match(XFF_RE)?.[1]?.trim();
}

/** Fetch the debug page and report how the edge saw the request. */
export const request: ProbeHandler = async (ctx) => {
  const res = await fetchOk(ctx, debugUrl(ctx, '/'));
  const html = await res.text();
  const servedBy = res.headers.get('x-served-by') ?? undefined;

  return new FieldSet()
    .add('status', res.status)
    .addOptional('served_by', servedBy)
    .addOptional('datacenter', servedBy === undefined ? undefined : parseDatacenter(servedBy))
    .addOptional('xff', parseXff(html))
    .addOptional('user_agent', ctx.requestHeaders['user-agent'])
    .addOptional('accept_language', ctx.requestHeaders['accept-language'])
    .toFields();
};
