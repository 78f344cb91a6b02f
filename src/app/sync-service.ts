/**
 * Credential sync for one devbox: decide, log in, fetch, push, verify.
 */

import type { KeyringScope, ProcessRunner } from '../types/index.js';
import { StaleAfterSyncError } from '../errors.js';
import { runProcess } from '../infra/process.js';
import { localProbe, needsRefresh, runLogin } from '../credentials/helper.js';
import type { Keychain } from '../credentials/keychain.js';
import { pushCredential } from '../credentials/keyctl.js';
import { withSshSession, type RemoteShell, type SshSessionOptions } from '../ssh/session.js';

export interface SyncOptions {
  remote: string;
  credentialHelper: string;
  keychainService: string;
  keyPrefix: string;
  keyRealm: string;
  keyring: KeyringScope;
  /** Log in and push even when both credentials look valid. */
  force: boolean;
  forceLocal: boolean;
  forceRemote: boolean;
  /** Probe the remote once more after pushing. */
  verify: boolean;
}

export type SyncStage = 'checking' | 'login' | 'push' | 'verify';

export interface SyncDependencies {
  keychain: Keychain;
  runner?: ProcessRunner;
  onStage?: (stage: SyncStage, detail: string) => void;
}

export type SyncOutcome =
  | { status: 'fresh' }
  | { status: 'synced'; loggedIn: boolean; verified: boolean };

/**
 * Local side: probe the helper here and log in when it asks for it.
 * Resolves to whether a login happened.
 */
async function refreshLocal(options: SyncOptions, deps: SyncDependencies): Promise<boolean> {
  const runner = deps.runner ?? runProcess;
  const stale =
    options.force ||
    options.forceLocal ||
    (await needsRefresh(localProbe(options.credentialHelper), options.remote, options.credentialHelper, runner));
  if (!stale) return false;

  deps.onStage?.('login', options.remote);
  await runLogin(options.credentialHelper, options.remote, runner);
  return true;
}

function probeRemote(shell: RemoteShell, options: SyncOptions, deps: SyncDependencies): Promise<boolean> {
  return needsRefresh(
    shell.command(options.credentialHelper, 'get'),
    options.remote,
    options.credentialHelper,
    deps.runner ?? runProcess,
  );
}

async function checkRemote(shell: RemoteShell, options: SyncOptions, deps: SyncDependencies): Promise<boolean> {
  if (options.force || options.forceRemote) return true;
  return probeRemote(shell, options, deps);
}

/**
 * Runs the local and remote checks side by side, then pushes the keychain credential
 * when either side was stale. A local failure wins over a remote one: a broken local
 * helper usually explains the remote failure as well.
 */
export async function syncCredential(
  shell: RemoteShell,
  options: SyncOptions,
  deps: SyncDependencies,
): Promise<SyncOutcome> {
  deps.onStage?.('checking', shell.host);
  const [local, remote] = await Promise.allSettled([
    refreshLocal(options, deps),
    checkRemote(shell, options, deps),
  ]);
  if (local.status === 'rejected') throw local.reason;
  if (remote.status === 'rejected') throw remote.reason;

  const loggedIn = local.value;
  if (!loggedIn && !remote.value) {
    return { status: 'fresh' };
  }

  deps.onStage?.('push', shell.host);
  const credential = await deps.keychain.getPassword(options.keychainService, options.remote);
  await pushCredential(
    shell,
    credential,
    {
      remote: options.remote,
      keyring: options.keyring,
      keyPrefix: options.keyPrefix,
      keyRealm: options.keyRealm,
    },
    deps.runner ?? runProcess,
  );

  if (options.verify) {
    deps.onStage?.('verify', shell.host);
    // A single re-check; a credential that is still stale means something we cannot fix by looping.
    if (await probeRemote(shell, options, deps)) {
      throw new StaleAfterSyncError(shell.host);
    }
  }

  return { status: 'synced', loggedIn, verified: options.verify };
}

/**
 * Opens the session, syncs through it and always tears it down again.
 */
export function runSync(
  session: SshSessionOptions,
  options: SyncOptions,
  deps: SyncDependencies,
): Promise<SyncOutcome> {
  return withSshSession({ runner: deps.runner, ...session }, (shell) => syncCredential(shell, options, deps));
}
