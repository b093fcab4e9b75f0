/**
 * Error taxonomy
 *
 * Per-unit adapter failures never escape as exceptions; they are converted
 * into AdapterOutcome values at the unit boundary. Only DiscoveryError and
 * ReportEmissionError are structural.
 */

/** A source could not be materialised into the workspace */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly location: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/** Units could not be discovered; aborts the build */
export class DiscoveryError extends Error {
  constructor(
    message: string,
    public readonly root: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

/** Reports could not be written; propagated to the caller */
export class ReportEmissionError extends Error {
  constructor(
    message: string,
    public readonly reportPath: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'ReportEmissionError';
  }
}

/** A package registry could not report the latest version */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly packageName: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

/** An adapter call exceeded its timeout or the build deadline */
export class AdapterTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    public readonly reason: 'timeout' | 'deadline' = 'timeout'
  ) {
    super(
      reason === 'deadline'
        ? `${operation} aborted: build deadline exceeded`
        : `${operation} timed out after ${timeoutMs}ms`
    );
    this.name = 'AdapterTimeoutError';
  }
}

/** Another live process holds the cache lock */
export class CacheLockError extends Error {
  constructor(
    public readonly lockFile: string,
    public readonly holderPid: number | null
  ) {
    super(
      holderPid === null
        ? `Cache is locked (${lockFile})`
        : `Cache is locked by process ${holderPid} (${lockFile})`
    );
    this.name = 'CacheLockError';
  }
}

/** Invalid build configuration */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Result of a guarded adapter call
 */
export type AdapterOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: 'timeout' | 'error'; message: string };

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Narrow to a Node.js system error carrying an errno code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
