// CHANGE: Define the error taxonomy surfaced by sessions and remote calls.
// WHY: Callers must tell configuration, remote, circuit-open and local-cache failures apart.

/**
 * Root of every error raised by this package.
 */
export class RelAssetError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad endpoint URI, missing credential or malformed configuration value.
 */
export class ConfigurationError extends RelAssetError {}

/**
 * Repository path that cannot be stored in the archive (empty, `..` segments).
 */
export class InvalidResourcePathError extends RelAssetError {
  constructor(readonly path: string, reason: string) {
    super(`Invalid resource path "${path}": ${reason}`);
  }
}

/**
 * Existing local archive that cannot be read as a zip file.
 *
 * Invariant: never recovered from by starting with an empty archive.
 */
export class CacheCorruptionError extends RelAssetError {
  constructor(readonly file: string, options?: { readonly cause?: unknown }) {
    super(`Local archive cache ${file} is unreadable; remove it manually after checking its contents`, options);
  }
}

/**
 * Operation attempted on a session or archive that was already closed.
 */
export class SessionClosedError extends RelAssetError {}

/**
 * Second open of a local archive cache that this process already holds.
 */
export class CacheInUseError extends RelAssetError {
  constructor(readonly cacheKey: string) {
    super(`Local archive cache ${cacheKey} is already open in this process`);
  }
}

export type RemoteFailureKind = "RetryExhausted" | "Permanent" | "CircuitOpen";

/**
 * Identifies one remote call for diagnostics.
 *
 * @property operation - Logical operation name, e.g. `ensureRelease`.
 * @property resource - Remote identifier the call acts on.
 */
export interface CallDescriptor {
  readonly operation: string;
  readonly resource: string;
}

export interface RemoteFailureDetails {
  readonly status?: number;
  readonly body?: string;
  readonly cause?: unknown;
}

/**
 * Failure of a remote call after the resilience stack gave up on it.
 */
export abstract class RemoteCallError extends RelAssetError {
  abstract readonly kind: RemoteFailureKind;
  readonly operation: string;
  readonly resource: string;
  readonly status?: number;
  readonly body?: string;

  protected constructor(call: CallDescriptor, message: string, details: RemoteFailureDetails = {}) {
    const status = details.status === undefined ? "" : ` (status ${details.status})`;
    super(`${call.operation} ${call.resource} failed${status}: ${message}`, { cause: details.cause });
    this.operation = call.operation;
    this.resource = call.resource;
    this.status = details.status;
    this.body = details.body;
  }
}

/**
 * Transient failures persisted through every allowed attempt.
 */
export class RetryExhaustedError extends RemoteCallError {
  readonly kind = "RetryExhausted";

  constructor(call: CallDescriptor, readonly attempts: number, message: string, details: RemoteFailureDetails = {}) {
    super(call, `${message} after ${attempts} attempt(s)`, details);
  }
}

/**
 * Non-retryable failure: unexpected status, malformed payload or protocol violation.
 */
export class PermanentError extends RemoteCallError {
  readonly kind = "Permanent";

  constructor(call: CallDescriptor, message: string, details: RemoteFailureDetails = {}) {
    super(call, message, details);
  }
}

/**
 * Redirect chain longer than the configured bound.
 */
export class TooManyRedirectsError extends PermanentError {
  constructor(call: CallDescriptor, readonly maxRedirects: number) {
    super(call, `too many redirects (limit ${maxRedirects})`);
  }
}

/**
 * Asset creation still reports a name collision after one delete-and-recreate.
 */
export class AssetConflictError extends PermanentError {}

/**
 * Circuit breaker rejected the call without contacting the remote API.
 */
export class CircuitOpenError extends RemoteCallError {
  readonly kind = "CircuitOpen";

  constructor(call: CallDescriptor, readonly retryInMs: number) {
    super(call, `remote API unavailable, circuit open (retry in ${retryInMs}ms)`);
  }
}
