import type { KeyringScope, ProcessResult, ProcessRunner } from '../types/index.js';
import { RemoteSyncError } from '../errors.js';
import { formatFailure, runProcess } from '../infra/process.js';
import type { RemoteShell } from '../ssh/session.js';

export const DEFAULT_KEY_PREFIX = 'keyring-rs';
export const DEFAULT_KEY_REALM = 'AspectWorkflows';

export interface PushOptions {
  remote: string;
  keyring: KeyringScope;
  keyPrefix?: string;
  keyRealm?: string;
}

/** Name the remote helper looks its credential up by. */
export function buildKeyName(remote: string, prefix = DEFAULT_KEY_PREFIX, realm = DEFAULT_KEY_REALM): string {
  return `${prefix}:${remote}@${realm}`;
}

export function keyringSelector(scope: KeyringScope): '@u' | '@s' {
  return scope === 'session' ? '@s' : '@u';
}

/**
 * `keyctl padd user <key> <keyring>` on the remote host, with the secret on stdin so
 * it never shows up in an argv.
 */
export async function pushCredential(
  shell: RemoteShell,
  credential: string,
  options: PushOptions,
  runner: ProcessRunner = runProcess,
): Promise<void> {
  const keyName = buildKeyName(options.remote, options.keyPrefix, options.keyRealm);
  const invocation = shell.command('keyctl', 'padd', 'user', keyName, keyringSelector(options.keyring));

  let result: ProcessResult;
  try {
    result = await runner(invocation, { input: credential, stdout: 'ignore' });
  } catch (error) {
    throw new RemoteSyncError(`failed to run keyctl on ${shell.host}`, { host: shell.host, cause: error });
  }

  if (result.code !== 0) {
    throw new RemoteSyncError(formatFailure(`ssh ${shell.host} keyctl padd`, result), {
      host: shell.host,
      stderr: result.stderr,
    });
  }
}
