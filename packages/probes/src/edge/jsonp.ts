/**
 * Extract the JSON argument from a JSONP response such as
 * `FASTLY.setupPerfmap({'pops': []});`. The service quotes with single
 * quotes, so they are swapped for double quotes before parsing.
 */
export function parseJsonp(body: string, callback: string): unknown {
  const start = body.indexOf(`${callback}(`);
  if (start === -1) {
    throw new Error(`JSONP callback ${callback} not found in response`);
  }
  const end = body.lastIndexOf(')');
  const from = start + callback.length + 1;
  if (end < from) {
    throw new Error(`Unterminated JSONP call to ${callback}`);
  }

  const payload = body.slice(from, end).trim().replace(/'/g, '"');
  try {
    return JSON.parse(payload);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'invalid JSON';
    throw new Error(`Malformed JSONP payload from ${callback}: ${reason}`);
  }
}
