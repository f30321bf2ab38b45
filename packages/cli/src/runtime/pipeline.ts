import type { ProbeEnvironment, ProbeRegistry } from '@edge-debug/probes';
import { CollectionAbortedError, type EncodedArtifact, type ShareFormat } from '@edge-debug/shared';
import { logger } from '../logger.js';
import { Collector } from './collector.js';
import { type ArtifactMeta, encode, toShareable } from './encoder.js';
import type { ScrubPattern } from './scrubber.js';
import { type Destination, describeDestination, writeArtifact } from './sink.js';

export interface RunDiagnosticsOptions {
  registry: ProbeRegistry;
  environment: ProbeEnvironment;
  destination: Destination;
  format: ShareFormat;
  timeoutMs?: number;
  parallel?: boolean;
  scrubPatterns?: ScrubPattern[];
  signal?: AbortSignal;
  meta?: ArtifactMeta;
}

/** Collect, encode and deliver one artifact. Errors propagate to the caller. */
export async function runDiagnostics(options: RunDiagnosticsOptions): Promise<EncodedArtifact> {
  const collector = new Collector(options.registry, {
    environment: options.environment,
    timeoutMs: options.timeoutMs,
    parallel: options.parallel,
    scrubPatterns: options.scrubPatterns,
  });

  const start = Date.now();
  const record = await collector.collect(options.signal);
  const artifact = encode(record, options.meta);

  // Nothing is emitted once cancellation has been requested
  if (options.signal?.aborted) throw new CollectionAbortedError();

  await writeArtifact(toShareable(artifact, options.format), options.destination);

  const failed = record.entries.filter((entry) => entry.result.status === 'failure').length;
  logger.info(
    {
      probes: record.entries.length,
      failed,
      digest: artifact.digest,
      destination: describeDestination(options.destination),
      durationMs: Date.now() - start,
    },
    'Diagnostics collected',
  );

  return artifact;
}
