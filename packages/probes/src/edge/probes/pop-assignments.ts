import { z } from 'zod';
import { FieldSet, toFieldName } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';
import { fetchOk, parseWith } from '../http.js';
import { parseJsonp } from '../jsonp.js';
import { fetchPerfmap } from '../perfmap.js';

export const POPNAME_CALLBACK = 'fastly.setPopName';

const PopName = z.object({ popname: z.string() });

/**
 * For every perfmap domain (one per address-resolution method), ask the
 * edge which POP answered.
 */
export const popAssignments: ProbeHandler = async (ctx) => {
  const perfmap = await fetchPerfmap(ctx);
  const fields = new FieldSet();

  for (const domain of perfmap.domains) {
    const url =
      `https://${domain.hostname}/popname.js` +
      `?jsonp=${POPNAME_CALLBACK}&unique=${ctx.clientId}`;
    const res = await fetchOk(ctx, url);
    const info = parseWith(PopName, parseJsonp(await res.text(), POPNAME_CALLBACK), 'popname.js');
    fields.addDistinct(toFieldName(domain.type), info.popname);
  }

  return fields.toFields();
};
