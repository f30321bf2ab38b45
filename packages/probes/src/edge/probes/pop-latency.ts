import { FieldSet, toFieldName } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { timedDownload } from '../http.js';
import { fetchPerfmap } from '../perfmap.js';

/** Round-trip time in whole ms to fetch a small object from each perfmap POP. */
export const popLatency: ProbeHandler = async (ctx) => {
  const perfmap = await fetchPerfmap(ctx);
  const fields = new FieldSet();

  for (const pop of perfmap.pops) {
    const url =
      `https://${pop.hostname}/testobject.svg?unique=${ctx.clientId}-perfmap` +
      `&popId=${encodeURIComponent(pop.popId)}`;
    const { elapsedMs } = await timedDownload(ctx, url);
    fields.addDistinct(toFieldName(pop.popId), Math.round(elapsedMs));
  }

  return fields.toFields();
};
