/**
 * Registry or destination is misconfigured. Surfaced to the caller and
 * turned into a non-zero exit.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProbeRegistryError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeRegistryError';
  }
}

/**
 * Canonicalization invariant was broken (duplicate field, bad field name).
 * This is a programming defect, never a probe failure.
 */
export class EncodingInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingInvariantError';
  }
}

export class SinkError extends Error {
  readonly destination: string;

  constructor(destination: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkError';
    this.destination = destination;
  }
}

export class CollectionAbortedError extends Error {
  constructor(message = 'Collection aborted') {
    super(message);
    this.name = 'CollectionAbortedError';
  }
}

export class ProbeTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ArtifactFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArtifactFormatError';
  }
}
