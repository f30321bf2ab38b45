import {
  ConfigurationError,
  DEFAULT_PROBE_TIMEOUT_MS,
  MAX_PROBE_TIMEOUT_MS,
  ShareFormat,
} from '@edge-debug/shared';
import { z } from 'zod';

export const CliCommand = z.enum(['collect', 'probes', 'verify', 'help', 'version']);
export type CliCommand = z.infer<typeof CliCommand>;

export const LogLevel = z.enum(['debug', 'info', 'error']);
export type LogLevel = z.infer<typeof LogLevel>;

export const CliOptions = z.object({
  command: CliCommand,
  /** Artifact file; stdout when absent */
  out: z.string().min(1).optional(),
  /** Artifact to check, `-` for stdin */
  verifyPath: z.string().min(1).optional(),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_PROBE_TIMEOUT_MS)
    .default(DEFAULT_PROBE_TIMEOUT_MS),
  sequential: z.boolean().default(false),
  format: ShareFormat.default('text'),
  scrub: z.array(z.string().min(1)).default([]),
  logLevel: LogLevel.default('info'),
});
export type CliOptions = z.infer<typeof CliOptions>;

const VALUE_FLAGS: Record<string, 'out' | 'timeout' | 'scrub'> = {
  '-o': 'out',
  '--out': 'out',
  '-t': 'timeout',
  '--timeout': 'timeout',
  '--scrub': 'scrub',
};

const FLAG_NAMES: Record<string, string> = {
  out: '--out',
  timeoutMs: '--timeout',
  scrub: '--scrub',
  verifyPath: 'verify <file>',
};

function parseTimeout(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`Invalid --timeout: expected milliseconds, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Any malformed input is a ConfigurationError.
 */
export function parseArgs(argv: string[]): CliOptions {
  const positionals: string[] = [];
  const scrub: string[] = [];
  let out: string | undefined;
  let timeoutMs: number | undefined;
  let sequential = false;
  let base64 = false;
  let debug = false;
  let quiet = false;
  let help = false;
  let version = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    const valueFlag = VALUE_FLAGS[arg];
    if (valueFlag) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigurationError(`Option ${arg} requires a value`);
      }
      i++;
      if (valueFlag === 'out') out = value;
      else if (valueFlag === 'timeout') timeoutMs = parseTimeout(value);
      else scrub.push(value);
      continue;
    }

    switch (arg) {
      case '--sequential':
        sequential = true;
        break;
      case '--base64':
        base64 = true;
        break;
      case '-D':
      case '--debug':
        debug = true;
        break;
      case '-q':
      case '--quiet':
        quiet = true;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      case '-v':
      case '--version':
        version = true;
        break;
      default:
        // A lone "-" is a positional (stdin for verify)
        if (arg.startsWith('-') && arg !== '-') {
          throw new ConfigurationError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (debug && quiet) {
    throw new ConfigurationError('--debug and --quiet cannot be combined');
  }

  const [first, ...rest] = positionals;
  let command: CliCommand = 'collect';
  let verifyPath: string | undefined;

  if (first === 'probes') {
    command = 'probes';
  } else if (first === 'verify') {
    command = 'verify';
    verifyPath = rest.shift();
    if (!verifyPath) {
      throw new ConfigurationError('verify requires a file argument ("-" reads stdin)');
    }
  } else if (first !== undefined) {
    throw new ConfigurationError(`Unknown command: ${first}`);
  }

  if (rest.length > 0) {
    throw new ConfigurationError(`Unexpected argument: ${rest[0]}`);
  }

  if (help) command = 'help';
  else if (version) command = 'version';

  const result = CliOptions.safeParse({
    command,
    out,
    verifyPath,
    timeoutMs,
    sequential,
    format: base64 ? 'base64' : 'text',
    scrub,
    logLevel: debug ? 'debug' : quiet ? 'error' : 'info',
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const key = String(issue?.path[0] ?? '');
    const flag = FLAG_NAMES[key] ?? key;
    throw new ConfigurationError(`Invalid ${flag}: ${issue?.message ?? 'invalid value'}`);
  }

  return result.data;
}
