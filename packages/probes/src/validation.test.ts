import { ConfigurationError, ProbeRegistryError } from '@edge-debug/shared';
import { describe, expect, it, vi } from 'vitest';
import type { ProbeSuite } from './types.js';
import { createProbeRegistry, validateSuite } from './validation.js';

function createMockSuite(name: string, overrides?: Partial<ProbeSuite>): ProbeSuite {
  return {
    manifest: {
      name,
      version: '0.1.0',
      description: `${name} suite`,
      probes: [
        { name: 'first', description: 'First probe', timeout: 2_000 },
        { name: 'second', description: 'Second probe' },
      ],
    },
    handlers: {
      [`${name}.first`]: vi.fn().mockResolvedValue([]),
      [`${name}.second`]: vi.fn().mockResolvedValue([]),
    },
    ...overrides,
  };
}

describe('validateSuite', () => {
  it('accepts a suite whose handlers match its manifest', () => {
    expect(() => validateSuite(createMockSuite('host'))).not.toThrow();
  });

  it('rejects a missing handler', () => {
    const suite = createMockSuite('host', {
      handlers: { 'host.first': vi.fn() },
    });

    expect(() => validateSuite(suite)).toThrow(
      'Suite "host": missing handler for probe "host.second"',
    );
  });

  it('rejects an extra handler', () => {
    const base = createMockSuite('host');
    const suite = createMockSuite('host', {
      handlers: { ...base.handlers, 'host.third': vi.fn() },
    });

    expect(() => validateSuite(suite)).toThrow('Suite "host": extra handler "host.third" not in manifest');
  });

  it('rejects duplicate probe names and malformed ids', () => {
    const dup = createMockSuite('host');
    dup.manifest.probes.push({ name: 'first', description: 'Again' });
    expect(() => validateSuite(dup)).toThrow('Suite "host": duplicate probe "host.first"');

    const bad = createMockSuite('host');
    bad.manifest.probes = [{ name: 'has space', description: 'Bad' }];
    bad.handlers = { 'host.has space': vi.fn() };
    expect(() => validateSuite(bad)).toThrow(ProbeRegistryError);
  });
});

describe('createProbeRegistry', () => {
  it('flattens suites in suite then manifest order', () => {
    const registry = createProbeRegistry([createMockSuite('host'), createMockSuite('edge')]);

    expect(registry.map((p) => p.id)).toEqual(['host.first', 'host.second', 'edge.first', 'edge.second']);
    expect(registry[0]?.timeoutMs).toBe(2_000);
    expect(registry[1]?.timeoutMs).toBeUndefined();
    expect(registry[2]?.suite).toBe('edge');
  });

  it('returns a frozen registry', () => {
    const registry = createProbeRegistry([createMockSuite('host')]);

    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry[0])).toBe(true);
  });

  it('rejects duplicate suite names as a configuration error', () => {
    expect(() => createProbeRegistry([createMockSuite('host'), createMockSuite('host')])).toThrow(
      ConfigurationError,
    );
  });

  it('allows an empty registry', () => {
    expect(createProbeRegistry([])).toEqual([]);
  });
});
