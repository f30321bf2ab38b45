import type { z } from 'zod';
import type { EdgeResponse, ProbeContext } from '../types.js';

/** GET a URL with the context's signal; non-2xx responses throw */
export async function fetchOk(ctx: ProbeContext, url: string): Promise<EdgeResponse> {
  const res = await ctx.fetch(url, { signal: ctx.signal });
  if (!res.ok) {
    throw new Error(`${new URL(url).pathname} returned ${res.status}`);
  }
  return res;
}

/** GET a JSON document and validate it against a schema */
export async function fetchJson<T extends z.ZodTypeAny>(
  ctx: ProbeContext,
  url: string,
  schema: T,
): Promise<z.output<T>> {
  const res = await fetchOk(ctx, url);
  const body = await res.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new Error(`${new URL(url).pathname} returned invalid JSON`);
  }
  return parseWith(schema, parsed, new URL(url).pathname);
}

/** Validate a payload, turning zod issues into a one-line probe error */
export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  source: string,
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new Error(`Unexpected response from ${source}${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/** Time a GET including the full body download. Returns elapsed ms and body size. */
export async function timedDownload(
  ctx: ProbeContext,
  url: string,
): Promise<{ elapsedMs: number; bytes: number; response: EdgeResponse }> {
  const start = ctx.clock();
  const response = await fetchOk(ctx, url);
  const body = await response.arrayBuffer();
  return { elapsedMs: ctx.clock() - start, bytes: body.byteLength, response };
}

export function analyticsUrl(ctx: ProbeContext, path: string, suffix = ''): string {
  return `https://${ctx.clientId}${suffix}.${ctx.endpoints.analyticsDomain}${path}`;
}

export function debugUrl(ctx: ProbeContext, path: string): string {
  return `https://${ctx.endpoints.debugHost}${path}`;
}
