/**
 * argv builders for every ssh invocation a session makes.
 *
 * The option set mirrors what scp passes to its ssh child: no forwarding, no local
 * or remote command overrides, and batch mode so nothing ever prompts.
 */

import type { ProcessInvocation } from '../types/index.js';

export const SSH_BINARY = 'ssh';

export const BATCH_OPTIONS: readonly string[] = [
  '-oPermitLocalCommand=no',
  '-oClearAllForwardings=yes',
  '-oRemoteCommand=none',
  '-oForwardAgent=no',
  '-oBatchMode=yes',
];

export interface SshTarget {
  host: string;
  /** Passed through verbatim, ahead of everything this module adds. */
  sshArgs: readonly string[];
}

/** `ssh -G <host>`: dump the effective client configuration without connecting. */
export function buildConfigQuery(host: string): ProcessInvocation {
  return { command: SSH_BINARY, args: ['-G', host] };
}

/**
 * Starts a persistent control master on `socketPath`, or, without one, opens a
 * plain session so a host that multiplexes on its own gets its master started
 * with its normal options.
 */
export function buildMasterInvocation(target: SshTarget, socketPath?: string): ProcessInvocation {
  const args = [...target.sshArgs];
  if (socketPath !== undefined) {
    args.push('-xMTS', socketPath, '-oControlPersist=yes', ...BATCH_OPTIONS);
  }
  args.push('--', target.host, 'true');
  return { command: SSH_BINARY, args };
}

export function buildRemoteInvocation(
  target: SshTarget,
  remoteCommand: readonly string[],
  socketPath?: string,
): ProcessInvocation {
  const args = [...target.sshArgs];
  if (socketPath !== undefined) {
    args.push('-S', socketPath);
  }
  args.push('-xT', ...BATCH_OPTIONS, '--', target.host, ...remoteCommand);
  return { command: SSH_BINARY, args };
}

export function buildExitInvocation(target: SshTarget, socketPath: string): ProcessInvocation {
  return {
    command: SSH_BINARY,
    args: [...target.sshArgs, '-S', socketPath, '-Oexit', '--', target.host],
  };
}
