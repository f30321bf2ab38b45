import type { ProbeEnvironment, ProbeRegistry, RegisteredProbe } from '@edge-debug/probes';
import {
  CollectionAbortedError,
  ConfigurationError,
  DEFAULT_PROBE_TIMEOUT_MS,
  type DiagnosticRecord,
  EncodingInvariantError,
  type ProbeField,
  ProbeTimeoutError,
  type RecordEntry,
} from '@edge-debug/shared';
import { logger } from '../logger.js';
import { type ScrubPattern, buildPatterns, scrubFields, scrubString } from './scrubber.js';

export interface CollectorOptions {
  environment: ProbeEnvironment;
  /** Applied to probes that declare no timeout of their own */
  timeoutMs?: number;
  /** Run probes concurrently (default true). Record order is unaffected. */
  parallel?: boolean;
  scrubPatterns?: ScrubPattern[];
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * Runs every registered probe and assembles the diagnostic record in
 * registry order. A probe that throws or times out becomes a failure entry;
 * only invariant violations and cancellation escape.
 */
export class Collector {
  private readonly registry: ProbeRegistry;
  private readonly environment: ProbeEnvironment;
  private readonly timeoutMs: number;
  private readonly parallel: boolean;
  private readonly scrubPatterns: ScrubPattern[];

  constructor(registry: ProbeRegistry, options: CollectorOptions) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`Probe timeout must be a positive integer, got ${timeoutMs}`);
    }

    this.registry = registry;
    this.environment = options.environment;
    this.timeoutMs = timeoutMs;
    this.parallel = options.parallel ?? true;
    this.scrubPatterns = options.scrubPatterns ?? buildPatterns();
  }

  /** Effective timeout for a probe */
  timeoutFor(probe: RegisteredProbe): number {
    return probe.timeoutMs ?? this.timeoutMs;
  }

  async collect(signal?: AbortSignal): Promise<DiagnosticRecord> {
    if (signal?.aborted) throw new CollectionAbortedError();

    let entries: RecordEntry[];
    if (this.parallel) {
      entries = await Promise.all(this.registry.map((probe) => this.runProbe(probe, signal)));
    } else {
      entries = [];
      for (const probe of this.registry) {
        entries.push(await this.runProbe(probe, signal));
      }
    }

    if (signal?.aborted) throw new CollectionAbortedError();
    return { entries };
  }

  private async runProbe(probe: RegisteredProbe, outer?: AbortSignal): Promise<RecordEntry> {
    const timeoutMs = this.timeoutFor(probe);
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(new CollectionAbortedError());
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    const start = Date.now();
    const session = this.environment.open(controller.signal);
    let timer: NodeJS.Timeout | undefined;

    try {
      const aborted = new Promise<never>((_, reject) => {
        controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
          once: true,
        });
      });
      timer = setTimeout(() => controller.abort(new ProbeTimeoutError(timeoutMs)), timeoutMs);

      const fields: ProbeField[] = await Promise.race([probe.handler(session.context), aborted]);
      const scrubbed = scrubFields(fields, this.scrubPatterns);

      logger.debug(
        { probe: probe.id, fields: scrubbed.length, durationMs: Date.now() - start },
        'Probe succeeded',
      );
      return { probe: probe.id, result: { status: 'success', fields: scrubbed } };
    } catch (error) {
      if (error instanceof EncodingInvariantError) throw error;
      if (outer?.aborted || error instanceof CollectionAbortedError) {
        throw new CollectionAbortedError();
      }

      const message = scrubString(errorMessage(error), this.scrubPatterns);
      logger.debug(
        { probe: probe.id, err: message, durationMs: Date.now() - start },
        'Probe failed',
      );
      return { probe: probe.id, result: { status: 'failure', error: message } };
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
      await session.close().catch((closeError: unknown) => {
        logger.warn(
          { probe: probe.id, err: errorMessage(closeError) },
          'Failed to release probe resources',
        );
      });
    }
  }
}
