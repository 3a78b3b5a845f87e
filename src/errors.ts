export type BundlerErrorCode = 'CONFIG' | 'UPSTREAM';

export class BundlerError extends Error {
  constructor(
    message: string,
    readonly code: BundlerErrorCode,
  ) {
    super(message);
    this.name = 'BundlerError';
  }
}

/** Contract violation in engine options. The only error that leaves the engine. */
export class ConfigError extends BundlerError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** HTTP status, network failure or timeout from an upstream collaborator. */
export class UpstreamError extends BundlerError {
  constructor(
    message: string,
    readonly source: string,
    readonly status?: number,
    /** Parsed from a Retry-After header, when the upstream sent one. */
    readonly retryAfterMs?: number,
  ) {
    super(message, 'UPSTREAM');
    this.name = 'UpstreamError';
  }

  /** 429 and 5xx are worth another attempt; other 4xx are not. Network errors have no status. */
  get retryable(): boolean {
    if (this.status === undefined) return true;
    return this.status === 429 || this.status >= 500;
  }
}
