import { PROBE_ID_RE, ProbeRegistryError } from '@edge-debug/shared';
import type { ProbeRegistry, ProbeSuite, RegisteredProbe } from './types.js';

/**
 * Validates that a suite's handlers match its manifest probes exactly.
 * - Every probe in manifest must have a handler keyed as `{suite}.{probe}`
 * - No extra handlers may exist beyond what the manifest declares
 */
export function validateSuite(suite: ProbeSuite): void {
  const suiteName = suite.manifest.name;
  const expectedKeys = new Set<string>();

  for (const probe of suite.manifest.probes) {
    const key = `${suiteName}.${probe.name}`;
    if (!PROBE_ID_RE.test(key)) {
      throw new ProbeRegistryError(`Suite "${suiteName}": invalid probe id "${key}"`);
    }
    if (expectedKeys.has(key)) {
      throw new ProbeRegistryError(`Suite "${suiteName}": duplicate probe "${key}"`);
    }
    expectedKeys.add(key);
  }

  const actualKeys = new Set(Object.keys(suite.handlers));

  for (const key of expectedKeys) {
    if (!actualKeys.has(key)) {
      throw new ProbeRegistryError(`Suite "${suiteName}": missing handler for probe "${key}"`);
    }
  }

  for (const key of actualKeys) {
    if (!expectedKeys.has(key)) {
      throw new ProbeRegistryError(`Suite "${suiteName}": extra handler "${key}" not in manifest`);
    }
  }
}

/**
 * Validates all suites and flattens them into a frozen, ordered registry.
 * Suite order, then manifest order, is the canonical probe order.
 */
export function createProbeRegistry(suites: ProbeSuite[]): ProbeRegistry {
  const seenSuites = new Set<string>();
  const probes: RegisteredProbe[] = [];

  for (const suite of suites) {
    validateSuite(suite);

    if (seenSuites.has(suite.manifest.name)) {
      throw new ProbeRegistryError(`Duplicate suite name: "${suite.manifest.name}"`);
    }
    seenSuites.add(suite.manifest.name);

    for (const def of suite.manifest.probes) {
      const id = `${suite.manifest.name}.${def.name}`;
      const handler = suite.handlers[id];
      if (!handler) {
        throw new ProbeRegistryError(
          `Suite "${suite.manifest.name}": missing handler for probe "${id}"`,
        );
      }
      probes.push(
        Object.freeze({
          id,
          description: def.description,
          suite: suite.manifest.name,
          timeoutMs: def.timeout,
          handler,
        }),
      );
    }
  }

  return Object.freeze(probes);
}
