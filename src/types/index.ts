/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

/**
 * How the session gets its control socket.
 * - create: stand up a private control master in a temporary directory
 * - reuse: rely on the host's own ssh multiplexing (or none at all)
 * - infer: ask `ssh -G` whether the host already multiplexes
 */
export type SocketPolicy = 'create' | 'reuse' | 'infer';

/** Kernel keyring the credential is added to on the remote host. */
export type KeyringScope = 'user' | 'session';

export interface ReauthConfig {
  /** DNS name of the remote build service; required before a sync can run. */
  remote?: string;
  credentialHelper: string;
  /** Keychain service the helper stores its credential under. */
  keychainService: string;
  /** Prefix and realm of the kernel key name, `<prefix>:<remote>@<realm>`. */
  keyPrefix: string;
  keyRealm: string;
  defaultHost: string;
}

/** A command line to spawn, without any stdio attached yet. */
export interface ProcessInvocation {
  command: string;
  args: string[];
}

export type StdioTarget = 'pipe' | 'ignore' | 'inherit';

export interface RunOptions {
  /** Written to stdin, which is then closed. When absent stdin is not opened. */
  input?: string;
  stdout?: StdioTarget;
  stderr?: StdioTarget;
}

export interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (invocation: ProcessInvocation, options?: RunOptions) => Promise<ProcessResult>;
