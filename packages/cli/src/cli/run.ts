import fs from 'node:fs';
import type { Writable } from 'node:stream';
import {
  type ProbeEnvironment,
  type ProbeRegistry,
  createNetworkEnvironment,
  probeRegistry,
} from '@edge-debug/probes';
import {
  ArtifactFormatError,
  CollectionAbortedError,
  ConfigurationError,
  EncodingInvariantError,
  SinkError,
} from '@edge-debug/shared';
import { type CliOptions, parseArgs } from '../config.js';
import { logger } from '../logger.js';
import { verifyArtifact } from '../runtime/encoder.js';
import { runDiagnostics } from '../runtime/pipeline.js';
import { buildPatterns } from '../runtime/scrubber.js';
import { TOOL_NAME, VERSION } from '../version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVARIANT = 2;
export const EXIT_INTERRUPTED = 130;

export interface CliDeps {
  registry: ProbeRegistry;
  createEnvironment: (options: CliOptions) => ProbeEnvironment;
  log: (msg: string) => void;
  error: (msg: string) => void;
  /** Artifact output when no --out is given */
  stdout: Writable;
  /** Read an artifact for verify; `-` is stdin */
  readInput: (path: string) => Promise<string>;
  signal?: AbortSignal;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function createDefaultDeps(signal?: AbortSignal): CliDeps {
  return {
    registry: probeRegistry,
    createEnvironment: (options) =>
      createNetworkEnvironment({
        userAgent: `${TOOL_NAME}/${VERSION}`,
        connectTimeoutMs: options.timeoutMs,
      }),
    log: console.log,
    error: console.error,
    stdout: process.stdout,
    readInput: (path) => (path === '-' ? readStdin() : fs.promises.readFile(path, 'utf-8')),
    signal,
  };
}

export function printUsage(log: (msg: string) => void): void {
  log(`Usage: ${TOOL_NAME} [command] [options]`);
  log('');
  log('Commands:');
  log('  (none)           Collect diagnostics and print the artifact');
  log('  probes           List registered probes in run order');
  log('  verify <file>    Check an artifact against its digest ("-" reads stdin)');
  log('');
  log('Options:');
  log('  -o, --out <path>      Write the artifact to a file instead of stdout');
  log('  -t, --timeout <ms>    Per-probe timeout (default 10000)');
  log('      --sequential      Run probes one at a time');
  log('      --base64          Emit URL-safe base64 instead of text');
  log('      --scrub <regex>   Extra redaction pattern (repeatable)');
  log('  -D, --debug           Debug logging on stderr');
  log('  -q, --quiet           Only log errors');
  log('  -v, --version         Print version');
  log('  -h, --help            Show this help');
}

export function cmdProbes(deps: CliDeps): number {
  if (deps.registry.length === 0) {
    deps.log('No probes registered.');
    return EXIT_OK;
  }

  const width = Math.max(...deps.registry.map((probe) => probe.id.length));
  for (const probe of deps.registry) {
    const timeout = probe.timeoutMs !== undefined ? ` (timeout ${probe.timeoutMs}ms)` : '';
    deps.log(`  ${probe.id.padEnd(width)}  ${probe.description}${timeout}`);
  }
  return EXIT_OK;
}

export async function cmdVerify(path: string, deps: CliDeps): Promise<number> {
  let input: string;
  try {
    input = await deps.readInput(path);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    deps.error(`Error: Cannot read ${path}: ${reason}`);
    return EXIT_FAILURE;
  }

  try {
    const result = verifyArtifact(input);
    if (!result.ok) {
      deps.error(
        `Digest mismatch: header sha256:${result.expected}, content sha256:${result.actual}`,
      );
      return EXIT_FAILURE;
    }
    deps.log(`OK ${result.tool} ${result.version} sha256:${result.actual}`);
    return EXIT_OK;
  } catch (err: unknown) {
    if (err instanceof ArtifactFormatError) {
      deps.error(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

export async function cmdCollect(options: CliOptions, deps: CliDeps): Promise<number> {
  try {
    const artifact = await runDiagnostics({
      registry: deps.registry,
      environment: deps.createEnvironment(options),
      destination: options.out
        ? { kind: 'file', path: options.out }
        : { kind: 'stdout', stream: deps.stdout },
      format: options.format,
      timeoutMs: options.timeoutMs,
      parallel: !options.sequential,
      scrubPatterns: buildPatterns(options.scrub),
      signal: deps.signal,
    });
    if (options.out) {
      deps.error(`Artifact written to ${options.out} (sha256:${artifact.digest})`);
    }
    return EXIT_OK;
  } catch (err: unknown) {
    if (err instanceof CollectionAbortedError) {
      deps.error('Interrupted, no artifact written.');
      return EXIT_INTERRUPTED;
    }
    if (err instanceof EncodingInvariantError) {
      logger.fatal({ err }, 'Encoding invariant violated');
      return EXIT_INVARIANT;
    }
    if (err instanceof ConfigurationError || err instanceof SinkError) {
      deps.error(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

/** Run the command line and resolve to the process exit code */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      deps.error(`Error: ${err.message}`);
      deps.error(`Run "${TOOL_NAME} --help" for usage.`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  logger.level = options.logLevel;

  switch (options.command) {
    case 'help':
      printUsage(deps.log);
      return EXIT_OK;
    case 'version':
      deps.log(VERSION);
      return EXIT_OK;
    case 'probes':
      return cmdProbes(deps);
    case 'verify':
      return cmdVerify(options.verifyPath ?? '-', deps);
    case 'collect':
      return cmdCollect(options, deps);
  }
}
