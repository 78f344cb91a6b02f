/**
 * Error types for a credential sync run.
 *
 * Everything except CleanupWarning aborts the run. Captured stderr is kept on the
 * error so the CLI can show it; the message already carries its trimmed form.
 */

interface ErrorDetails {
  cause?: unknown;
}

/**
 * Base class for every failure the sync reports.
 */
export class ReauthError extends Error {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ReauthError';
    Object.setPrototypeOf(this, ReauthError.prototype);
  }
}

/**
 * The control master (or the plain validation connection) could not be set up.
 */
export class ConnectionError extends ReauthError {
  public readonly host: string;
  public readonly stderr: string;

  constructor(message: string, details: ErrorDetails & { host: string; stderr?: string }) {
    super(message, details);
    this.name = 'ConnectionError';
    this.host = details.host;
    this.stderr = details.stderr ?? '';
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * `<helper> get` failed for a reason other than an expired login.
 */
export class HelperProtocolError extends ReauthError {
  public readonly helper: string;
  public readonly stderr: string;

  constructor(message: string, details: ErrorDetails & { helper: string; stderr?: string }) {
    super(message, details);
    this.name = 'HelperProtocolError';
    this.helper = details.helper;
    this.stderr = details.stderr ?? '';
    Object.setPrototypeOf(this, HelperProtocolError.prototype);
  }
}

export class LoginError extends ReauthError {
  public readonly helper: string;
  public readonly remote: string;

  constructor(message: string, details: ErrorDetails & { helper: string; remote: string }) {
    super(message, details);
    this.name = 'LoginError';
    this.helper = details.helper;
    this.remote = details.remote;
    Object.setPrototypeOf(this, LoginError.prototype);
  }
}

/**
 * The local keychain could not be read or written for (service, account).
 */
export class KeychainError extends ReauthError {
  public readonly service: string;
  public readonly account: string;

  constructor(message: string, details: ErrorDetails & { service: string; account: string }) {
    super(message, details);
    this.name = 'KeychainError';
    this.service = details.service;
    this.account = details.account;
    Object.setPrototypeOf(this, KeychainError.prototype);
  }
}

/**
 * `keyctl padd` on the remote host failed.
 */
export class RemoteSyncError extends ReauthError {
  public readonly host: string;
  public readonly stderr: string;

  constructor(message: string, details: ErrorDetails & { host: string; stderr?: string }) {
    super(message, details);
    this.name = 'RemoteSyncError';
    this.host = details.host;
    this.stderr = details.stderr ?? '';
    Object.setPrototypeOf(this, RemoteSyncError.prototype);
  }
}

/**
 * The remote probe still asks for a login right after a successful push.
 */
export class StaleAfterSyncError extends ReauthError {
  public readonly host: string;

  constructor(host: string) {
    super(`credential on ${host} still needs a refresh after syncing; retry with --force`);
    this.name = 'StaleAfterSyncError';
    this.host = host;
    Object.setPrototypeOf(this, StaleAfterSyncError.prototype);
  }
}

/**
 * Teardown of the control master or its socket directory failed. Reported, never thrown.
 */
export class CleanupWarning extends ReauthError {
  public readonly host: string;

  constructor(message: string, details: ErrorDetails & { host: string }) {
    super(message, details);
    this.name = 'CleanupWarning';
    this.host = details.host;
    Object.setPrototypeOf(this, CleanupWarning.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The message followed by each underlying cause, innermost last. */
export function describeError(error: unknown): string {
  const parts = [errorMessage(error)];
  let cause: unknown = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined && parts.length < 8) {
    parts.push(`caused by: ${errorMessage(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return parts.join('\n');
}
