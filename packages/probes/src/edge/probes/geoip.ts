import { FieldSet, toFieldName } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { fetchPerfmap } from '../perfmap.js';

/** GeoIP view of the client, from the perfmap config. Nested values are skipped. */
export const geoip: ProbeHandler = async (ctx) => {
  const perfmap = await fetchPerfmap(ctx);
  const fields = new FieldSet();

  for (const [key, value] of Object.entries(perfmap.geo_ip)) {
    const name = toFieldName(key);
    if (fields.has(name)) continue;
    if (typeof value === 'string' || typeof value === 'boolean') {
      fields.add(name, value);
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      fields.add(name, value);
    }
  }

  return fields.toFields();
};
