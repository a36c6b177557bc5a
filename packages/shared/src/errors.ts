/**
 * The configuration file is missing or invalid. Fatal for the invocation.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The root directory of a site cannot be read. Fatal for that site.
 */
export class ScanError extends Error {
  constructor(
    public readonly rootDir: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ScanError";
  }
}

/**
 * A call to the remote API failed. Transient errors are worth retrying.
 */
export class RemoteError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RemoteError";
  }
}

/** Connection failures and timeouts. */
export class NetworkError extends RemoteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, undefined, options);
    this.name = "NetworkError";
  }
}

/** The API key was rejected. */
export class AuthError extends RemoteError {
  constructor(message: string, status?: number) {
    super(message, false, status);
    this.name = "AuthError";
  }
}

/**
 * The planner was handed inconsistent input. Indicates a bug.
 */
export class PlanInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanInvariantError";
  }
}

/**
 * Queued work dropped because the run was cancelled.
 */
export class CancelledError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof RemoteError && error.transient;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
