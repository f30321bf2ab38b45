import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';

export const platform: ProbeHandler = async (ctx) =>
  new FieldSet()
    .add('os', ctx.host.platform())
    .add('release', ctx.host.release())
    .add('arch', ctx.host.arch())
    .toFields();
