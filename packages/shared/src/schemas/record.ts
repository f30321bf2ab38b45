import { z } from 'zod';

/** Field names: letters, digits, `_`, `.` and `-`; never `=` or whitespace */
export const FIELD_NAME_RE = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

/** Probe ids: `<suite>.<probe>` style, dot separated segments */
export const PROBE_ID_RE = /^[A-Za-z][A-Za-z0-9_-]*(?:\.[A-Za-z0-9_-]+)*$/;

export const FieldValue = z.union([z.string(), z.number().finite(), z.boolean()]);
export type FieldValue = z.infer<typeof FieldValue>;

/**
 * A single named value produced by a probe. `redacted` is set when the
 * value was masked during result construction.
 */
export const ProbeField = z.object({
  name: z.string().regex(FIELD_NAME_RE),
  value: FieldValue,
  redacted: z.boolean().default(false),
});
export type ProbeField = z.infer<typeof ProbeField>;

export const ProbeResult = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    fields: z.array(ProbeField),
  }),
  z.object({
    status: z.literal('failure'),
    error: z.string(),
  }),
]);
export type ProbeResult = z.infer<typeof ProbeResult>;

export const RecordEntry = z.object({
  /** Registered probe id, e.g. "edge.dns" */
  probe: z.string().regex(PROBE_ID_RE),
  result: ProbeResult,
});
export type RecordEntry = z.infer<typeof RecordEntry>;

/**
 * Ordered outcome of one collection run, one entry per registered probe.
 */
export const DiagnosticRecord = z.object({
  entries: z.array(RecordEntry),
});
export type DiagnosticRecord = z.infer<typeof DiagnosticRecord>;

export const EncodedArtifact = z.object({
  tool: z.string(),
  version: z.string(),
  algorithm: z.literal('sha256'),
  /** Lowercase hex digest of `canonical` */
  digest: z.string().regex(/^[0-9a-f]{64}$/),
  header: z.string(),
  /** Canonical text, newline terminated */
  canonical: z.string(),
  /** header + "\n" + canonical */
  text: z.string(),
});
export type EncodedArtifact = z.infer<typeof EncodedArtifact>;
