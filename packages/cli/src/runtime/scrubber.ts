import { ConfigurationError, PRIVATE_IP_MASK, type ProbeField, REDACTED } from '@edge-debug/shared';

export interface ScrubPattern {
  name: string;
  pattern: RegExp;
  replacement?: string;
}

/** Field names that indicate sensitive values (case-insensitive match) */
const SENSITIVE_NAME_RE = /(?:SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE|API[_-]?KEY|COOKIE)/i;

// RFC 1918, carrier-grade NAT and link-local
const PRIVATE_IPV4_RE = new RegExp(
  String.raw`\b(?:` +
    [
      String.raw`10(?:\.\d{1,3}){3}`,
      String.raw`192\.168(?:\.\d{1,3}){2}`,
      String.raw`172\.(?:1[6-9]|2\d|3[01])(?:\.\d{1,3}){2}`,
      String.raw`100\.(?:6[4-9]|[7-9]\d|1[01]\d|12[0-7])(?:\.\d{1,3}){2}`,
      String.raw`169\.254(?:\.\d{1,3}){2}`,
    ].join('|') +
    String.raw`)\b`,
  'g',
);

export const DEFAULT_SCRUB_PATTERNS: ScrubPattern[] = [
  {
    name: 'private-ipv4',
    pattern: PRIVATE_IPV4_RE,
    replacement: PRIVATE_IP_MASK,
  },
  {
    name: 'env-var-secrets',
    pattern: /\b(\w*(?:SECRET|TOKEN|PASSWORD|CREDENTIAL)\w*)\s*[=:]\s*\S+/gi,
    replacement: `$1=${REDACTED}`,
  },
  {
    name: 'url-credentials',
    pattern: /(\b[a-z][a-z0-9+.-]*:\/\/[^:/\s]+:)[^@\s]+(@)/gi,
    replacement: `$1${REDACTED}$2`,
  },
  {
    name: 'bearer-tokens',
    pattern: /(Bearer\s+)\S+/gi,
    replacement: `$1${REDACTED}`,
  },
  {
    name: 'generic-api-keys',
    pattern: /(api[_-]?key|access[_-]?token|auth[_-]?token)\s*[=:]\s*["']?[\w\-./+=]{16,}["']?/gi,
    replacement: `$1=${REDACTED}`,
  },
];

export function scrubString(str: string, patterns: ScrubPattern[]): string {
  let result = str;
  for (const p of patterns) {
    // Reset lastIndex for global regexes
    p.pattern.lastIndex = 0;
    result = result.replace(p.pattern, p.replacement ?? REDACTED);
  }
  return result;
}

/**
 * Apply scrub patterns to every string field and mask fields whose names
 * look sensitive. A field that changes is flagged `redacted`.
 */
export function scrubFields(fields: ProbeField[], patterns: ScrubPattern[]): ProbeField[] {
  return fields.map((field) => {
    if (field.redacted) return field;

    if (SENSITIVE_NAME_RE.test(field.name)) {
      return { ...field, value: REDACTED, redacted: true };
    }

    if (typeof field.value !== 'string') return field;

    const scrubbed = scrubString(field.value, patterns);
    return scrubbed === field.value ? field : { ...field, value: scrubbed, redacted: true };
  });
}

/**
 * Build scrub patterns from defaults + optional custom regex strings.
 * An invalid custom regex is a configuration error.
 */
export function buildPatterns(customRegexes?: string[]): ScrubPattern[] {
  const patterns = [...DEFAULT_SCRUB_PATTERNS];

  if (customRegexes) {
    for (const raw of customRegexes) {
      let pattern: RegExp;
      try {
        pattern = new RegExp(raw, 'gi');
      } catch (error) {
        const reason = error instanceof Error ? error.message : 'invalid pattern';
        throw new ConfigurationError(`Invalid scrub pattern "${raw}": ${reason}`);
      }
      patterns.push({ name: `custom:${raw}`, pattern });
    }
  }

  return patterns;
}
