type ProvisioningErrorKind =
  | 'auth'
  | 'quota'
  | 'server'
  | 'network'
  | 'invalid-response'
  | 'proxy'
  | 'unexpected';

/**
 * Root of every error raised by the cloud browser pool.
 *
 * `retryable` tells the surrounding pipeline whether the page may be
 * scheduled again; the pool itself never retries a page fetch.
 */
class CloudBrowserError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CloudBrowserError';
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

class ConfigError extends CloudBrowserError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: ErrorOptions) {
    super(`Invalid CLOUD_BROWSER configuration: ${issues.join('; ')}`, false, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

class ProvisioningError extends CloudBrowserError {
  readonly kind: ProvisioningErrorKind;
  readonly status: number | undefined;

  constructor(
    message: string,
    kind: ProvisioningErrorKind,
    status?: number,
    options?: ErrorOptions,
  ) {
    super(message, true, options);
    this.name = 'ProvisioningError';
    this.kind = kind;
    this.status = status;
  }
}

class SessionBrokenError extends CloudBrowserError {
  readonly sessionId: string;

  constructor(sessionId: string, reason: string, options?: ErrorOptions) {
    super(`Browser session ${sessionId} is broken: ${reason}`, true, options);
    this.name = 'SessionBrokenError';
    this.sessionId = sessionId;
  }
}

class FetchError extends CloudBrowserError {
  readonly url: string;

  constructor(url: string, reason: string, options?: ErrorOptions) {
    super(`Failed to fetch ${url}: ${reason}`, true, options);
    this.name = 'FetchError';
    this.url = url;
  }
}

class PoolShutDownError extends CloudBrowserError {
  constructor(message = 'Browser pool is shutting down', options?: ErrorOptions) {
    super(message, false, options);
    this.name = 'PoolShutDownError';
  }
}

class TimeoutError extends CloudBrowserError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, true);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function abortReason(signal: AbortSignal, fallback: string): Error {
  return signal.reason instanceof Error ? signal.reason : new Error(fallback);
}

export {
  CloudBrowserError,
  ConfigError,
  ProvisioningError,
  SessionBrokenError,
  FetchError,
  PoolShutDownError,
  TimeoutError,
  toError,
  abortReason,
};
export type { ProvisioningErrorKind };
