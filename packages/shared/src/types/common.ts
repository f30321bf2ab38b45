import { z } from 'zod';

export const ShareFormat = z.enum(['text', 'base64']);
export type ShareFormat = z.infer<typeof ShareFormat>;

/** Default per-probe timeout in milliseconds */
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/** Upper bound accepted for --timeout */
export const MAX_PROBE_TIMEOUT_MS = 120_000;

/** Digest algorithm used for artifact integrity */
export const DIGEST_ALGORITHM = 'sha256';

/** Value substituted for masked field content */
export const REDACTED = '[REDACTED]';

/** Value substituted for private, link-local and unique-local addresses */
export const PRIVATE_IP_MASK = '[PRIVATE-IP]';

/** Body written when the registry produced no entries */
export const EMPTY_RECORD_BODY = 'no diagnostics collected';

/** Public endpoints of the CDN's debugging service */
export const DEFAULT_ANALYTICS_DOMAIN = 'u.fastly-analytics.com';
export const DEFAULT_DEBUG_HOST = 'www.fastly-debug.com';
