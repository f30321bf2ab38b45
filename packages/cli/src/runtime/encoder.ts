import {
  ArtifactFormatError,
  type DiagnosticRecord,
  EMPTY_RECORD_BODY,
  type EncodedArtifact,
  EncodingInvariantError,
  FIELD_NAME_RE,
  type FieldValue,
  type ProbeField,
  type ShareFormat,
  digestText,
  digestsEqual,
  fromBase64Url,
  toBase64Url,
} from '@edge-debug/shared';
import { TOOL_NAME, VERSION } from '../version.js';

export interface ArtifactMeta {
  tool: string;
  version: string;
}

const HEADER_RE = /^(\S+) (\S+) sha256:([0-9a-f]{64})$/;

/** Escape characters that would break the one-line-per-value grammar */
export function escapeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\r/g, '\\r').replace(/\n/g, '\\n');
}

export function renderValue(value: FieldValue): string {
  if (typeof value === 'string') return escapeValue(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (!Number.isFinite(value)) {
    throw new EncodingInvariantError(`Non-finite number cannot be encoded: ${value}`);
  }
  // String(-0) is already "0"; String() is locale independent
  return String(value);
}

/** Code-unit order, independent of the host's collation */
function compareNames(a: ProbeField, b: ProbeField): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function sortedFields(probe: string, fields: ProbeField[]): ProbeField[] {
  const seen = new Set<string>();
  for (const field of fields) {
    if (!FIELD_NAME_RE.test(field.name)) {
      throw new EncodingInvariantError(`Probe "${probe}": invalid field name "${field.name}"`);
    }
    if (seen.has(field.name)) {
      throw new EncodingInvariantError(`Probe "${probe}": duplicate field name "${field.name}"`);
    }
    seen.add(field.name);
  }
  return [...fields].sort(compareNames);
}

/**
 * Render the canonical text of a record: one `probe.field=value` line per
 * field in record order, then one `probe: FAILED - message` line per failed
 * probe. Always newline terminated.
 */
export function canonicalize(record: DiagnosticRecord): string {
  if (record.entries.length === 0) {
    return `${EMPTY_RECORD_BODY}\n`;
  }

  const lines: string[] = [];
  const failures: string[] = [];
  const seenProbes = new Set<string>();

  for (const { probe, result } of record.entries) {
    if (seenProbes.has(probe)) {
      throw new EncodingInvariantError(`Duplicate probe in record: "${probe}"`);
    }
    seenProbes.add(probe);

    if (result.status === 'failure') {
      failures.push(`${probe}: FAILED - ${escapeValue(result.error)}`);
      continue;
    }

    if (result.fields.length === 0) {
      lines.push(`${probe}: OK (no fields)`);
      continue;
    }

    for (const field of sortedFields(probe, result.fields)) {
      lines.push(`${probe}.${field.name}=${renderValue(field.value)}`);
    }
  }

  return `${[...lines, ...failures].join('\n')}\n`;
}

export function formatHeader(meta: ArtifactMeta, digest: string): string {
  return `${meta.tool} ${meta.version} sha256:${digest}`;
}

/** Encode a record into its digest-stamped artifact. Deterministic for equal records. */
export function encode(
  record: DiagnosticRecord,
  meta: ArtifactMeta = { tool: TOOL_NAME, version: VERSION },
): EncodedArtifact {
  const canonical = canonicalize(record);
  const digest = digestText(canonical);
  const header = formatHeader(meta, digest);

  return {
    tool: meta.tool,
    version: meta.version,
    algorithm: 'sha256',
    digest,
    header,
    canonical,
    text: `${header}\n${canonical}`,
  };
}

/** Content to hand to the sink for the requested format */
export function toShareable(artifact: EncodedArtifact, format: ShareFormat): string {
  return format === 'base64' ? `${toBase64Url(artifact.text)}\n` : artifact.text;
}

export interface VerifyResult {
  ok: boolean;
  tool: string;
  version: string;
  /** Digest stated in the header */
  expected: string;
  /** Digest recomputed over the body */
  actual: string;
}

function splitArtifact(text: string): { header: RegExpMatchArray; body: string } | undefined {
  const normalized = text.replace(/\r\n/g, '\n').replace(/^\s+/, '');
  const newline = normalized.indexOf('\n');
  const firstLine = newline === -1 ? normalized : normalized.slice(0, newline);
  const header = firstLine.match(HEADER_RE);
  if (!header) return undefined;

  const body = (newline === -1 ? '' : normalized.slice(newline + 1)).replace(/\n*$/, '\n');
  return { header, body };
}

/**
 * Check a shared artifact, in text or base64 form, against its own header.
 * Line-ending changes and lost or extra final newlines are tolerated.
 */
export function verifyArtifact(input: string): VerifyResult {
  const parsed = splitArtifact(input) ?? splitArtifact(fromBase64Url(input));
  if (!parsed) {
    throw new ArtifactFormatError('Not an edge-debug artifact: header line not found');
  }

  const [, tool = '', version = '', expected = ''] = parsed.header;
  const actual = digestText(parsed.body);

  return { ok: digestsEqual(expected, actual), tool, version, expected, actual };
}
