// Types
export {
  ShareFormat,
  DEFAULT_PROBE_TIMEOUT_MS,
  MAX_PROBE_TIMEOUT_MS,
  DIGEST_ALGORITHM,
  REDACTED,
  PRIVATE_IP_MASK,
  EMPTY_RECORD_BODY,
  DEFAULT_ANALYTICS_DOMAIN,
  DEFAULT_DEBUG_HOST,
} from './types/common.js';

// Schemas — Record
export {
  FIELD_NAME_RE,
  PROBE_ID_RE,
  FieldValue,
  ProbeField,
  ProbeResult,
  RecordEntry,
  DiagnosticRecord,
  EncodedArtifact,
} from './schemas/record.js';

// Schemas — Suites
export { ProbeDefinition, SuiteManifest } from './schemas/suites.js';

// Errors
export {
  ConfigurationError,
  ProbeRegistryError,
  EncodingInvariantError,
  SinkError,
  CollectionAbortedError,
  ProbeTimeoutError,
  ArtifactFormatError,
} from './errors.js';

// Crypto — Digest
export { digestText, digestsEqual, toBase64Url, fromBase64Url } from './crypto/digest.js';
