import { z } from 'zod';

/** Probe definition within a suite */
export const ProbeDefinition = z.object({
  /** Probe name within the suite, e.g. "dns" */
  name: z.string(),
  /** Human-readable description */
  description: z.string(),
  /** Probe timeout in ms; falls back to the collector default */
  timeout: z.number().int().positive().optional(),
});
export type ProbeDefinition = z.infer<typeof ProbeDefinition>;

/**
 * Suite manifest: a named, versioned group of probes. Probe order in the
 * manifest is the order they appear in the diagnostic record.
 */
export const SuiteManifest = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string(),
  probes: z.array(ProbeDefinition),
});
export type SuiteManifest = z.infer<typeof SuiteManifest>;
