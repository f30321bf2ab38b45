import { Writable } from 'node:stream';
import type { ProbeEnvironment, RegisteredProbe } from '@edge-debug/probes';
import { createTestContext } from '@edge-debug/probes/testing';
import { CollectionAbortedError, ConfigurationError, digestText, toBase64Url } from '@edge-debug/shared';
import { describe, expect, it } from 'vitest';
import { runDiagnostics } from './pipeline.js';

const environment: ProbeEnvironment = {
  open: (signal) => ({ context: createTestContext({ signal }), close: async () => {} }),
};

function probe(id: string, handler: RegisteredProbe['handler']): RegisteredProbe {
  return { id, description: id, suite: 'test', handler };
}

const registry: RegisteredProbe[] = [
  probe('DNSProbe', async () => [{ name: 'resolved_ip', value: '203.0.113.5', redacted: false }]),
  probe('TLSProbe', async () => {
    throw new Error('connection refused');
  }),
];

const meta = { tool: 'edge-debug', version: '1.0.0' };
const canonical = 'DNSProbe.resolved_ip=203.0.113.5\nTLSProbe: FAILED - connection refused\n';

function collectingStream(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  return { stream, chunks };
}

describe('runDiagnostics', () => {
  it('collects, encodes and writes the text artifact', async () => {
    const { stream, chunks } = collectingStream();

    const artifact = await runDiagnostics({
      registry,
      environment,
      destination: { kind: 'stdout', stream },
      format: 'text',
      meta,
    });

    const header = `edge-debug 1.0.0 sha256:${digestText(canonical)}`;
    expect(artifact.canonical).toBe(canonical);
    expect(artifact.header).toBe(header);
    expect(chunks.join('')).toBe(`${header}\n${canonical}`);
  });

  it('writes the base64 form when asked', async () => {
    const { stream, chunks } = collectingStream();

    const artifact = await runDiagnostics({
      registry,
      environment,
      destination: { kind: 'stdout', stream },
      format: 'base64',
      meta,
    });

    expect(chunks.join('')).toBe(`${toBase64Url(artifact.text)}\n`);
  });

  it('produces the same artifact on repeated runs', async () => {
    const run = () =>
      runDiagnostics({
        registry,
        environment,
        destination: { kind: 'stdout', stream: collectingStream().stream },
        format: 'text',
        meta,
      });

    const [first, second] = [await run(), await run()];

    expect(second.text).toBe(first.text);
  });

  it('emits nothing when cancelled', async () => {
    const { stream, chunks } = collectingStream();
    const controller = new AbortController();
    const hung = [probe('Hung', () => new Promise(() => {}))];

    const pending = runDiagnostics({
      registry: hung,
      environment,
      destination: { kind: 'stdout', stream },
      format: 'text',
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toThrow(CollectionAbortedError);
    expect(chunks).toEqual([]);
  });

  it('surfaces destination problems as configuration errors', async () => {
    await expect(
      runDiagnostics({
        registry,
        environment,
        destination: { kind: 'file', path: '/nonexistent-edge-debug-dir/artifact.txt' },
        format: 'text',
        meta,
      }),
    ).rejects.toThrow(ConfigurationError);
  });
});
